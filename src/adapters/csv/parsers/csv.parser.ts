/**
 * CSV Parser
 *
 * Comma separated, optional double-quoted fields with `""` escapes,
 * LF or CRLF line endings. Blank lines are skipped. Each record keeps the
 * 1-based file line it starts on, so quoted line breaks and skipped blank
 * lines never shift the numbers reported in errors.
 */

import { DatasetParseError } from '../../../domain/shared/errors/domain.error';

export interface CsvRecord {
	line: number;
	fields: string[];
}

export function parseCsv(text: string): CsvRecord[] {
	const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
	const records: CsvRecord[] = [];

	let record: string[] = [];
	let field = '';
	let inQuotes = false;
	let fieldQuoted = false;
	let line = 1;
	let recordLine = 1;

	const endField = (): void => {
		record.push(field);
		field = '';
		fieldQuoted = false;
	};

	const endRecord = (): void => {
		const blank = record.length === 0 && field === '' && !fieldQuoted;
		if (!blank) {
			endField();
			records.push({ line: recordLine, fields: record });
		}
		record = [];
		field = '';
		fieldQuoted = false;
	};

	for (let i = 0; i < input.length; i++) {
		const char = input[i];

		if (inQuotes) {
			if (char === '"') {
				if (input[i + 1] === '"') {
					field += '"';
					i++;
				} else {
					inQuotes = false;
				}
			} else {
				field += char;
				if (char === '\n' || (char === '\r' && input[i + 1] !== '\n')) {
					line++;
				}
			}
			continue;
		}

		if (char === '"' && field === '' && !fieldQuoted) {
			inQuotes = true;
			fieldQuoted = true;
		} else if (char === ',') {
			endField();
		} else if (char === '\n' || char === '\r') {
			if (char === '\r' && input[i + 1] === '\n') {
				i++;
			}
			endRecord();
			line++;
			recordLine = line;
		} else {
			field += char;
		}
	}

	if (inQuotes) {
		throw new DatasetParseError('unterminated quoted field', recordLine);
	}
	endRecord();

	return records;
}
