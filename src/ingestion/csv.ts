import {RawRow} from '../types';

type CsvRecord = {
    readonly line: number;
    readonly cells: string[];
};

function splitRecords(text: string): CsvRecord[] {
    const records: CsvRecord[] = [];
    let cells: string[] = [];
    let cell = '';
    let inQuotes = false;
    let line = 1;
    let recordLine = 1;

    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (inQuotes) {
            if (ch === '"' && text[i + 1] === '"') {
                cell += '"';
                i++;
            } else if (ch === '"') {
                inQuotes = false;
            } else {
                if (ch === '\n') line++;
                cell += ch;
            }
        } else if (ch === '"') {
            inQuotes = true;
        } else if (ch === ',') {
            cells.push(cell);
            cell = '';
        } else if (ch === '\n') {
            cells.push(cell);
            records.push({line: recordLine, cells});
            cells = [];
            cell = '';
            line++;
            recordLine = line;
        } else if (ch !== '\r') {
            cell += ch;
        }
    }
    if (cell !== '' || cells.length > 0) {
        cells.push(cell);
        records.push({line: recordLine, cells});
    }
    return records;
}

function isBlank(record: CsvRecord): boolean {
    return record.cells.every(cell => cell.trim() === '');
}

/**
 * Parse CSV text with a header row into raw rows keyed by lower-cased header.
 * Cells are trimmed; a row shorter than the header simply lacks the trailing
 * keys. Blank lines are ignored and `line` is the 1-based line a row starts on.
 */
export function parseCsv(text: string): RawRow[] {
    const [header, ...body] = splitRecords(text.replace(/^\uFEFF/, '')).filter(record => !isBlank(record));
    if (!header) {
        return [];
    }
    const keys = header.cells.map(cell => cell.trim().toLowerCase());

    return body.map(record => ({
        line: record.line,
        fields: Object.fromEntries(
            record.cells
                .slice(0, keys.length)
                .map((cell, i): [string, string] => [keys[i], cell.trim()])
        ),
    }));
}

/**
 * Turn plain objects (a JSON payload, a database row) into raw rows. Nested
 * values are dropped; null and undefined become missing fields.
 */
export function toRawRows(records: readonly unknown[]): RawRow[] {
    return records.map((record, index) => ({
        line: index + 1,
        fields: Object.fromEntries(
            Object.entries(typeof record === 'object' && record !== null ? record : {})
                .filter(([, value]) => ['string', 'number', 'boolean'].includes(typeof value))
                .map(([key, value]): [string, string] => [key.toLowerCase(), String(value).trim()])
        ),
    }));
}
