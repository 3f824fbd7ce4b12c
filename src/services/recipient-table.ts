import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import * as XLSX from 'xlsx';
import { FileReadError, MailMergeError, describeError } from '../errors';
import {
    EMAIL_COLUMN,
    MANAGED_COLUMNS,
    RECIPIENT_STATUSES,
    RecipientRecord,
    RecipientStatus,
    STATUS_COLUMN,
} from '../types';
import { logger } from './logger';

const SPREADSHEET_EXTENSIONS = new Set(['.xlsx', '.xls']);

/**
 * Recipient rows plus the managed tracking columns. Rows are addressed by
 * position and mutated in place while a run proceeds.
 */
export class RecipientTable {
    private constructor(
        readonly columns: string[],
        private readonly rows: RecipientRecord[],
    ) {}

    static fromRows(header: string[], data: string[][]): RecipientTable {
        const columns = header.map(name => name.trim());

        if (!columns.includes(EMAIL_COLUMN)) {
            throw new FileReadError(
                `Recipient list has no '${EMAIL_COLUMN}' column (found: ${columns.join(', ') || 'none'})`,
            );
        }

        for (const managed of MANAGED_COLUMNS) {
            if (!columns.includes(managed)) {
                columns.push(managed);
            }
        }

        const rows = data.map(cells => {
            const record: RecipientRecord = {};
            columns.forEach((column, i) => {
                record[column] = cells[i] ?? '';
            });
            record[STATUS_COLUMN] = normalizeStatus(record[STATUS_COLUMN]);
            return record;
        });

        return new RecipientTable(columns, rows);
    }

    get length(): number {
        return this.rows.length;
    }

    record(index: number): RecipientRecord {
        const row = this.rows[index];
        if (!row) {
            throw new RangeError(`No recipient at row ${index}`);
        }
        return row;
    }

    get(index: number, column: string): string {
        return this.record(index)[column] ?? '';
    }

    set(index: number, column: string, value: string) {
        this.record(index)[column] = value;
    }

    getStatus(index: number): RecipientStatus {
        return normalizeStatus(this.get(index, STATUS_COLUMN));
    }

    setStatus(index: number, status: RecipientStatus) {
        const current = this.getStatus(index);
        if (current === 'Sent' || current === 'Draft') {
            throw new MailMergeError(`Row ${index} is already ${current}`);
        }
        this.set(index, STATUS_COLUMN, status);
    }

    // Rows not yet Sent or Drafted, in table order
    pendingIndices(): number[] {
        const indices: number[] = [];
        this.rows.forEach((_, i) => {
            const status = this.getStatus(i);
            if (status !== 'Sent' && status !== 'Draft') {
                indices.push(i);
            }
        });
        return indices;
    }

    countByStatus(): Record<RecipientStatus, number> {
        const counts: Record<RecipientStatus, number> = { Pending: 0, Sent: 0, Draft: 0, Skipped: 0, Error: 0 };
        this.rows.forEach((_, i) => {
            counts[this.getStatus(i)] += 1;
        });
        return counts;
    }

    toCsv(): string {
        return stringify(this.rows, { header: true, columns: this.columns });
    }
}

export function normalizeStatus(value: string | undefined): RecipientStatus {
    const trimmed = (value ?? '').trim();
    return RECIPIENT_STATUSES.find(status => status === trimmed) ?? 'Pending';
}

// UTF-8 first; bytes that are not valid UTF-8 are read as Latin-1
export function decodeText(buffer: Buffer): string {
    try {
        return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    } catch (error) {
        logger.warn(`Input is not valid UTF-8, reading as Latin-1 (${describeError(error)})`);
        return buffer.toString('latin1');
    }
}

export function parseCsvContent(content: string): RecipientTable {
    let records: string[][];
    try {
        records = parse(content, {
            bom: true,
            skip_empty_lines: true,
            trim: true,
            relax_column_count: true,
        });
    } catch (error) {
        throw new FileReadError(`Unable to parse CSV: ${describeError(error)}`, { cause: error });
    }

    const [header, ...data] = records;
    if (!header) {
        throw new FileReadError('Recipient list is empty');
    }
    return RecipientTable.fromRows(header, data);
}

export function parseSpreadsheet(buffer: Buffer): RecipientTable {
    let rows: unknown[][];
    try {
        const workbook = XLSX.read(buffer, { type: 'buffer' });
        const sheetName = workbook.SheetNames[0];
        const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
        if (!sheet) {
            throw new FileReadError('Workbook has no sheets');
        }
        rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '', raw: false, blankrows: false });
    } catch (error) {
        if (error instanceof FileReadError) {
            throw error;
        }
        throw new FileReadError(`Unable to read spreadsheet: ${describeError(error)}`, { cause: error });
    }

    const [header, ...data] = rows.map(row => row.map(cellToText));
    if (!header) {
        throw new FileReadError('Recipient list is empty');
    }
    return RecipientTable.fromRows(header, data);
}

export function loadRecipientTable(filePath: string): RecipientTable {
    if (!fs.existsSync(filePath)) {
        throw new FileReadError(`Recipient file not found: ${filePath}`);
    }

    const extension = path.extname(filePath).toLowerCase();
    logger.info(`Reading recipient list: ${filePath}`);
    const buffer = fs.readFileSync(filePath);

    let table: RecipientTable;
    if (extension === '.csv') {
        table = parseCsvContent(decodeText(buffer));
    } else if (SPREADSHEET_EXTENSIONS.has(extension)) {
        table = parseSpreadsheet(buffer);
    } else {
        throw new FileReadError(`Unsupported file type '${extension || '(none)'}': expected .csv, .xlsx or .xls`);
    }

    logger.info(`Loaded ${table.length} recipients (${table.pendingIndices().length} pending)`);
    return table;
}

export function saveRecipientTable(table: RecipientTable, filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, table.toCsv(), 'utf-8');
}

function cellToText(cell: unknown): string {
    if (cell === null || cell === undefined) {
        return '';
    }
    return String(cell).trim();
}
