/**
 * Spreadsheet Processor
 *
 * Every worksheet becomes its own ProcessedContext (`${objectId}_${sheet}`)
 * holding a header chunk (columns, inferred types, numeric summary) and
 * row-batch chunks. Row 1 of each sheet is the header row.
 */

import { basename } from 'node:path';
import ExcelJS from 'exceljs';
import type { Worksheet } from 'exceljs';
import { FileContextProcessor, type ChunkDraft, type ProcessorOptions } from '../base-processor.js';
import type { ProcessedContext, RawContextProperties } from '../types.js';
import type { ExcelProcessingConfig } from '../../config/schema.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { renderTextTable } from '../../utils/table.js';
import { isRecord, readString } from '../../utils/guards.js';
import { describeError } from '../../utils/logger.js';

export type ColumnType = 'integer' | 'float' | 'boolean' | 'datetime' | 'string' | 'mixed' | 'empty';

type CellPrimitive = string | number | boolean | Date | null;

export interface SheetTable {
  name: string;
  range: string;
  type: 'excel_table';
}

export interface SheetComment {
  cell: string;
  comment: string;
}

interface SheetData {
  columns: string[];
  rows: CellPrimitive[][];
}

/** 1 → A, 27 → AA */
export function columnLetter(index: number): string {
  let letters = '';
  let n = index;
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

/**
 * Reduce an exceljs cell value (formula results, rich text, hyperlinks,
 * errors) to a primitive.
 */
export function toPrimitive(value: unknown): CellPrimitive {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  if (!isRecord(value)) return null;

  if ('result' in value) return toPrimitive(value.result);
  const richText = value.richText;
  if (Array.isArray(richText)) {
    return richText.map((run: unknown) => (isRecord(run) ? readString(run, 'text') ?? '' : '')).join('');
  }
  return readString(value, 'text') ?? readString(value, 'error') ?? null;
}

export function inferColumnType(values: readonly CellPrimitive[]): ColumnType {
  const present = values.filter((v): v is Exclude<CellPrimitive, null> => v !== null && v !== '');
  if (present.length === 0) return 'empty';
  if (present.every((v) => typeof v === 'boolean')) return 'boolean';
  if (present.every((v) => typeof v === 'number')) {
    return present.every((v) => Number.isInteger(v)) ? 'integer' : 'float';
  }
  if (present.every((v) => v instanceof Date)) return 'datetime';
  if (present.every((v) => typeof v === 'string')) return 'string';
  return 'mixed';
}

/**
 * Min, max and mean of the numeric entries, in one pass. Sheets can hold far
 * more rows than a spread argument list accepts.
 */
export function summarizeNumbers(values: readonly CellPrimitive[]): { min: number; max: number; mean: number } {
  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  let count = 0;
  for (const value of values) {
    if (typeof value !== 'number') continue;
    if (value < min) min = value;
    if (value > max) max = value;
    sum += value;
    count++;
  }
  return count === 0 ? { min: 0, max: 0, mean: 0 } : { min, max, mean: sum / count };
}

function displayValue(value: CellPrimitive): string | number {
  if (value === null) return '';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return value;
}

function noteText(note: unknown): string | undefined {
  if (typeof note === 'string') return note;
  if (isRecord(note) && Array.isArray(note.texts)) {
    return note.texts.map((run: unknown) => (isRecord(run) ? readString(run, 'text') ?? '' : '')).join('');
  }
  return undefined;
}

export class ExcelProcessor extends FileContextProcessor {
  static readonly SUPPORTED_FORMATS: ReadonlySet<string> = new Set(['.xlsx', '.xls']);

  readonly name = 'excel_processor';
  readonly description = 'Processor for spreadsheet workbooks, one context per sheet';

  private readonly config: ExcelProcessingConfig;

  constructor(config: Partial<ExcelProcessingConfig> = {}, options: ProcessorOptions = {}) {
    const merged = { ...DEFAULT_CONFIG.processing.excel, ...config };
    super(merged.enabled, options);
    this.config = merged;
  }

  getSupportedFormats(): ReadonlySet<string> {
    return ExcelProcessor.SUPPORTED_FORMATS;
  }

  protected async processFile(path: string, raw: RawContextProperties): Promise<ProcessedContext[]> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(path);

    const fileName = basename(path);
    const contexts: ProcessedContext[] = [];

    for (const sheet of workbook.worksheets) {
      const metadata = this.extractSheetMetadata(sheet, fileName, path);
      const data = this.readSheet(sheet);
      const chunks = [this.headerChunk(sheet.name, data), ...this.rowChunks(sheet, data)];
      const tables = metadata.tables ?? [];

      const context = this.buildContext(
        raw,
        {
          id: `${raw.objectId}_${sheet.name}`,
          title: `${fileName} - ${sheet.name}`,
          summary: `Excel sheet '${sheet.name}' with ${sheet.rowCount} rows and ${sheet.columnCount} columns`,
          keywords: [sheet.name, fileName, 'excel', 'spreadsheet', ...tables.map((t) => t.name)],
          entities: [],
          confidence: 90,
          importance: 70,
          metadata: { ...metadata },
        },
        chunks
      );
      if (context) contexts.push(context);
    }

    return contexts;
  }

  private extractSheetMetadata(sheet: Worksheet, fileName: string, path: string): SheetMetadata {
    const maxRow = sheet.rowCount;
    const maxColumn = sheet.columnCount;
    const metadata: SheetMetadata = {
      file_name: fileName,
      file_path: path,
      sheet_name: sheet.name,
      max_row: maxRow,
      max_column: maxColumn,
      dimensions: maxRow > 0 && maxColumn > 0 ? `A1:${columnLetter(maxColumn)}${maxRow}` : 'A1:A1',
    };

    if (this.config.detect_tables) {
      try {
        metadata.tables = this.detectTables(sheet);
      } catch (error) {
        this.logger.warn(`${this.name}: table detection failed on '${sheet.name}': ${describeError(error)}`);
      }
    }

    if (this.config.extract_comments) {
      try {
        const comments = this.extractComments(sheet);
        if (comments.length > 0) metadata.comments = comments;
      } catch (error) {
        this.logger.warn(`${this.name}: comment extraction failed on '${sheet.name}': ${describeError(error)}`);
      }
    }

    return metadata;
  }

  private detectTables(sheet: Worksheet): SheetTable[] {
    const tables: SheetTable[] = [];
    for (const entry of sheet.getTables()) {
      const table: unknown = Array.isArray(entry) ? entry[0] : entry;
      if (!isRecord(table)) continue;
      const model = isRecord(table.table) ? table.table : table;
      const name = readString(model, 'name') ?? readString(model, 'displayName');
      if (name === undefined) continue;
      tables.push({ name, range: readString(model, 'tableRef') ?? readString(model, 'ref') ?? '', type: 'excel_table' });
    }
    return tables;
  }

  private extractComments(sheet: Worksheet): SheetComment[] {
    const comments: SheetComment[] = [];
    sheet.eachRow({ includeEmpty: false }, (row) => {
      row.eachCell({ includeEmpty: false }, (cell) => {
        const text = noteText(cell.note);
        if (text !== undefined && text !== '') {
          comments.push({ cell: cell.address, comment: text });
        }
      });
    });
    return comments;
  }

  private readSheet(sheet: Worksheet): SheetData {
    const width = sheet.columnCount;
    const header = sheet.getRow(1);
    const columns: string[] = [];
    for (let c = 1; c <= width; c++) {
      const value = toPrimitive(header.getCell(c).value);
      const label = value === null || value === '' ? '' : String(displayValue(value));
      columns.push(label === '' ? `Unnamed: ${c - 1}` : label);
    }

    const rows: CellPrimitive[][] = [];
    for (let r = 2; r <= sheet.rowCount; r++) {
      const row = sheet.getRow(r);
      const values: CellPrimitive[] = [];
      for (let c = 1; c <= width; c++) {
        values.push(toPrimitive(row.getCell(c).value));
      }
      rows.push(values);
    }

    return { columns, rows };
  }

  private headerChunk(sheetName: string, data: SheetData): ChunkDraft {
    const types = data.columns.map((_, i) => inferColumnType(data.rows.map((row) => row[i] ?? null)));

    let text = `Sheet: ${sheetName}\n`;
    text += `Columns: ${data.columns.join(', ')}\n`;
    text += `Rows: ${data.rows.length}, Columns: ${data.columns.length}\n`;
    text += `\nData Types:\n${data.columns.map((col, i) => `${col}: ${types[i] ?? 'empty'}`).join('\n')}\n`;

    const numericLines: string[] = [];
    data.columns.forEach((col, i) => {
      if (types[i] !== 'integer' && types[i] !== 'float') return;
      const { min, max, mean } = summarizeNumbers(data.rows.map((row) => row[i] ?? null));
      numericLines.push(`${col}: min=${min}, max=${max}, mean=${mean.toFixed(2)}`);
    });
    if (numericLines.length > 0) {
      text += `\nNumeric Summary:\n${numericLines.join('\n')}\n`;
    }

    return { text, keywords: [sheetName, 'header', 'metadata'] };
  }

  private rowChunks(sheet: Worksheet, data: SheetData): ChunkDraft[] {
    const size = this.config.max_rows_per_chunk;
    const chunks: ChunkDraft[] = [];

    for (let i = 0; i < data.rows.length; i += size) {
      const batch = data.rows.slice(i, i + size);
      const first = i + 1;
      const last = i + batch.length;

      let text = `Sheet: ${sheet.name} (Rows ${first} to ${last})\n`;
      text += renderTextTable(data.columns, batch.map((row) => row.map(displayValue))) + '\n';

      if (this.config.extract_formulas) {
        // Data row k sits on sheet row k + 1 (row 1 is the header)
        const formulas = this.formulasInRange(sheet, first + 1, last + 1);
        if (formulas.length > 0) {
          text += `\nFormulas:\n${formulas.join('\n')}`;
        }
      }

      chunks.push({
        text,
        keywords: [sheet.name, `rows_${first}_to_${last}`, ...data.columns.slice(0, 5)],
      });
    }
    return chunks;
  }

  private formulasInRange(sheet: Worksheet, startRow: number, endRow: number): string[] {
    const formulas: string[] = [];
    for (let r = startRow; r <= Math.min(endRow, sheet.rowCount); r++) {
      const row = sheet.getRow(r);
      for (let c = 1; c <= sheet.columnCount; c++) {
        const cell = row.getCell(c);
        const formula: unknown = cell.formula;
        if (typeof formula === 'string' && formula !== '') {
          formulas.push(`${cell.address}: ${formula.startsWith('=') ? formula : `=${formula}`}`);
        } else if (typeof cell.value === 'string' && cell.value.startsWith('=')) {
          formulas.push(`${cell.address}: ${cell.value}`);
        }
      }
    }
    return formulas;
  }
}

type SheetMetadata = {
  file_name: string;
  file_path: string;
  sheet_name: string;
  max_row: number;
  max_column: number;
  dimensions: string;
  tables?: SheetTable[];
  comments?: SheetComment[];
};
