import { describe, it, expect } from 'vitest';
import { parseCsv } from '../../../../src/adapters/csv/parsers/csv.parser';
import { DatasetParseError } from '../../../../src/domain/shared/errors/domain.error';

describe('parseCsv', () => {
	it('should split records and fields', () => {
		expect(parseCsv('a,b,c\n1,2,3\n')).toEqual([
			{ line: 1, fields: ['a', 'b', 'c'] },
			{ line: 2, fields: ['1', '2', '3'] },
		]);
	});

	it('should accept CRLF and a missing final newline', () => {
		expect(parseCsv('a,b\r\n1,2')).toEqual([
			{ line: 1, fields: ['a', 'b'] },
			{ line: 2, fields: ['1', '2'] },
		]);
	});

	it('should skip blank lines but keep counting them', () => {
		expect(parseCsv('a,b\n\n1,2\n\n')).toEqual([
			{ line: 1, fields: ['a', 'b'] },
			{ line: 3, fields: ['1', '2'] },
		]);
	});

	it('should unquote fields and unescape doubled quotes', () => {
		expect(parseCsv('name,note\n"Smith, J","said ""hi""\nthen left"\n')).toEqual([
			{ line: 1, fields: ['name', 'note'] },
			{ line: 2, fields: ['Smith, J', 'said "hi"\nthen left'] },
		]);
	});

	it('should count line breaks inside quoted fields', () => {
		expect(parseCsv('a,b\r\n"x\r\ny",z\r\nc,d')).toEqual([
			{ line: 1, fields: ['a', 'b'] },
			{ line: 2, fields: ['x\r\ny', 'z'] },
			{ line: 4, fields: ['c', 'd'] },
		]);
	});

	it('should keep empty fields', () => {
		expect(parseCsv('a,,c\n"",x,\n')).toEqual([
			{ line: 1, fields: ['a', '', 'c'] },
			{ line: 2, fields: ['', 'x', ''] },
		]);
	});

	it('should strip a byte order mark', () => {
		expect(parseCsv('\uFEFFa,b\n1,2')).toEqual([
			{ line: 1, fields: ['a', 'b'] },
			{ line: 2, fields: ['1', '2'] },
		]);
	});

	it('should return no records for empty input', () => {
		expect(parseCsv('')).toEqual([]);
	});

	it('should report an unterminated quote at the line it opens on', () => {
		expect(() => parseCsv('a,b\n1,2\n3,"open\n')).toThrow(
			new DatasetParseError('unterminated quoted field', 3),
		);
	});
});
