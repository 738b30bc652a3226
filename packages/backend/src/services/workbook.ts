import ExcelJS from 'exceljs';
import type { CellValue, Workbook, Worksheet } from 'exceljs';
import type {
  AllocateResult,
  PlayerInput,
  PlayerSummary,
  SheetCell,
  SheetTable,
} from '@callup/shared';
import { REFERENCE_COLUMNS, ROSTER_COLUMNS, SUMMARY_COLUMNS } from '@callup/shared';
import { findMatchColumns } from './roster-import.js';

const MAX_SHEET_NAME_LENGTH = 31;

/**
 * Roster columns copied to the front of the output sheet, when present
 */
const BASE_COLUMNS = [
  ROSTER_COLUMNS.playerNumber,
  ROSTER_COLUMNS.name,
  ROSTER_COLUMNS.goalkeeper,
  ROSTER_COLUMNS.reserve,
];

/**
 * Reduce an exceljs cell value to a primitive
 */
export function normalizeCellValue(value: CellValue): SheetCell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  if ('richText' in value) return value.richText.map((part) => part.text).join('');
  if ('hyperlink' in value) return value.text;
  if ('error' in value) return null;
  if ('result' in value) {
    const result = value.result;
    if (result === undefined || (typeof result === 'object' && !(result instanceof Date))) {
      return null;
    }
    return normalizeCellValue(result);
  }
  return null;
}

function headerText(value: CellValue): string {
  const cell = normalizeCellValue(value);
  return cell === null ? '' : String(cell).trim();
}

/**
 * Read a worksheet as header titles plus rows keyed by title.
 * Columns without a title and rows without any value are skipped. A repeated
 * title gets a number, e.g. "IFK (Hemma)" then "IFK (Hemma) 2".
 */
export function readSheetTable(sheet: Worksheet): SheetTable {
  const headerRow = sheet.getRow(1);
  const columns: Array<{ index: number; title: string }> = [];
  const usedTitles = new Set<string>();
  for (let col = 1; col <= sheet.columnCount; col++) {
    const text = headerText(headerRow.getCell(col).value);
    if (text === '') continue;

    let title = text;
    for (let n = 2; usedTitles.has(title); n++) {
      title = `${text} ${n}`;
    }
    usedTitles.add(title);
    columns.push({ index: col, title });
  }

  const rows: Array<Record<string, SheetCell>> = [];
  for (let r = 2; r <= sheet.rowCount; r++) {
    const row = sheet.getRow(r);
    const record: Record<string, SheetCell> = {};
    let hasValue = false;
    for (const { index, title } of columns) {
      const value = normalizeCellValue(row.getCell(index).value);
      record[title] = value;
      if (value !== null && value !== '') hasValue = true;
    }
    if (hasValue) rows.push(record);
  }

  return { headers: columns.map((c) => c.title), rows };
}

/**
 * Find a worksheet by name and read it
 */
export function readRosterTable(workbook: Workbook, sheetName: string): SheetTable {
  const sheet = workbook.getWorksheet(sheetName);
  if (!sheet) {
    const names = workbook.worksheets.map((ws) => ws.name).join(', ');
    throw new Error(`Sheet "${sheetName}" not found (available: ${names || 'none'})`);
  }
  return readSheetTable(sheet);
}

export async function loadWorkbook(data: ArrayBuffer): Promise<Workbook> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(data);
  return workbook;
}

export async function readWorkbookFile(path: string): Promise<Workbook> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(path);
  return workbook;
}

/**
 * Replace characters Excel forbids in sheet names and cap the length
 */
export function sanitizeSheetName(name: string): string {
  const safe = name.replace(/[:\\/?*[\]]/g, '-');
  if (safe.length > MAX_SHEET_NAME_LENGTH) {
    return safe.substring(0, 28) + '...';
  }
  return safe;
}

/**
 * Sanitize a sheet name and suffix it until it is unused.
 * Excel compares sheet names case-insensitively.
 */
export function uniqueSheetName(name: string, usedNames: Set<string>): string {
  const base = sanitizeSheetName(name);
  let candidate = base;
  let n = 1;
  while (usedNames.has(candidate.toLowerCase())) {
    n++;
    candidate = `${base.substring(0, 27)}-${n}`;
  }
  usedNames.add(candidate.toLowerCase());
  return candidate;
}

function summaryCells(summary: PlayerSummary | undefined): number[] {
  if (!summary) return [0, 0, 0, 0, 0, 0, 0];
  return [
    summary.homeCalls,
    summary.awayCalls,
    summary.totalCalls,
    summary.reserveCalls,
    summary.goalkeeperCalls,
    summary.homeMatches,
    summary.awayMatches,
  ];
}

/**
 * Build the output workbook: the roster sheet with summary columns, then one
 * sheet per match. `players` must be in the same order as `table.rows`.
 */
export function buildAllocationWorkbook(
  table: SheetTable,
  players: readonly PlayerInput[],
  result: AllocateResult,
  sheetName: string
): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'callup';
  workbook.created = new Date();

  const usedNames = new Set<string>();
  const mainSheet = workbook.addWorksheet(uniqueSheetName(sheetName, usedNames), {
    views: [{ state: 'frozen', ySplit: 1 }],
  });

  const baseColumns = BASE_COLUMNS.filter((c) => table.headers.includes(c));
  const matchColumns = findMatchColumns(table.headers);
  mainSheet.addRow([
    ...baseColumns,
    ...Object.values(SUMMARY_COLUMNS),
    ...Object.values(REFERENCE_COLUMNS),
    ...matchColumns,
  ]);
  mainSheet.getRow(1).font = { bold: true };

  const summariesById = new Map(result.summaries.map((s) => [s.playerId, s]));
  table.rows.forEach((row, index) => {
    const playerId = players[index]?.id;
    const summary = playerId === undefined ? undefined : summariesById.get(playerId);
    mainSheet.addRow([
      ...baseColumns.map((c) => row[c] ?? null),
      ...summaryCells(summary),
      ...matchColumns.map((c) => row[c] ?? null),
    ]);
  });

  for (const matchSheet of result.matchSheets) {
    const sheet = workbook.addWorksheet(uniqueSheetName(matchSheet.title, usedNames));
    for (const row of matchSheet.rows) {
      sheet.addRow(row);
    }
    sheet.getColumn(1).font = { bold: true };
  }

  return workbook;
}
