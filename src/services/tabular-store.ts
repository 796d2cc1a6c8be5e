import fs from 'fs';
import path from 'path';
import { Workbook } from 'exceljs';
import type { CellValue } from 'exceljs';
import JSZip from 'jszip';
import type { TableRow } from '../types';

export interface WriteOptions {
  /** Stamped into the document properties and every zip entry. */
  timestamp?: Date;
}

export interface TabularStore {
  /** Rows of the first worksheet, keyed by the header row. */
  load(filePath: string): Promise<TableRow[]>;
  write(filePath: string, columns: string[], rows: TableRow[], options?: WriteOptions): Promise<void>;
}

/** Used when the caller gives no timestamp. Zip entry dates cannot go below 1980. */
export const DEFAULT_WRITE_TIMESTAMP = new Date(Date.UTC(1980, 0, 2));

export function cellText(value: CellValue): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (typeof value !== 'object') return String(value);
  if ('richText' in value) return value.richText.map((part) => part.text).join('');
  if ('hyperlink' in value) return String(value.text);
  if ('result' in value) return value.result === undefined ? '' : cellText(value.result);
  if ('error' in value) return value.error;
  return '';
}

export class XlsxTabularStore implements TabularStore {
  async load(filePath: string): Promise<TableRow[]> {
    const workbook = new Workbook();
    await workbook.xlsx.readFile(filePath);
    const sheet = workbook.worksheets[0];
    if (!sheet) {
      throw new Error(`No worksheets found in ${filePath}`);
    }

    const headerRow = sheet.getRow(1);
    const header: string[] = [];
    for (let col = 1; col <= headerRow.cellCount; col++) {
      header.push(cellText(headerRow.getCell(col).value));
    }

    const rows: TableRow[] = [];
    for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
      const row = sheet.getRow(rowNumber);
      if (!row.hasValues) continue;
      const record: TableRow = {};
      header.forEach((name, index) => {
        if (!name) return;
        record[name] = cellText(row.getCell(index + 1).value);
      });
      rows.push(record);
    }
    return rows;
  }

  /**
   * Every value is written as text, and the same table and timestamp always
   * give the same bytes. The workbook lands in a sibling temp file first and
   * is renamed over the target, so readers never see a half-written report.
   */
  async write(filePath: string, columns: string[], rows: TableRow[], options: WriteOptions = {}): Promise<void> {
    const timestamp = options.timestamp ?? DEFAULT_WRITE_TIMESTAMP;
    const workbook = new Workbook();
    workbook.created = timestamp;
    workbook.modified = timestamp;
    const sheet = workbook.addWorksheet('Report');
    sheet.addRow(columns);
    for (const row of rows) {
      sheet.addRow(columns.map((column) => row[column] ?? ''));
    }

    const packed = await workbook.xlsx.writeBuffer();
    const content = await repackWithDate(new Uint8Array(packed), timestamp);

    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    const tmp = `${filePath}.tmp`;
    await fs.promises.writeFile(tmp, content);
    await fs.promises.rename(tmp, filePath);
  }
}

/** Rebuild the zip with one fixed modification date on every entry. */
async function repackWithDate(packed: Uint8Array, date: Date): Promise<Buffer> {
  const source = await JSZip.loadAsync(packed);
  const target = new JSZip();
  for (const entry of Object.values(source.files)) {
    if (entry.dir) continue;
    target.file(entry.name, await entry.async('uint8array'), { date, createFolders: false });
  }
  return target.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE', compressionOptions: { level: 6 } });
}
