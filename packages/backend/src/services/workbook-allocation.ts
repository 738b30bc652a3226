import type { Workbook } from 'exceljs';
import type { AllocateResult, AllocationConfig, RosterImportError } from '@callup/shared';
import { runAllocation } from './call-up-allocator/index.js';
import { importRosterSheet } from './roster-import.js';
import { buildAllocationWorkbook, readRosterTable } from './workbook.js';

export type WorkbookAllocationOutcome =
  | { ok: true; result: AllocateResult; output: Workbook }
  | { ok: false; stage: 'import'; importErrors: RosterImportError[] }
  | { ok: false; stage: 'allocation'; result: AllocateResult };

/**
 * Read the roster sheet, allocate, and build the output workbook
 */
export function allocateWorkbook(
  workbook: Workbook,
  sheetName: string,
  config: Partial<AllocationConfig> = {},
  options: { verbose?: boolean } = {}
): WorkbookAllocationOutcome {
  const table = readRosterTable(workbook, sheetName);
  const imported = importRosterSheet(table);
  if (imported.errors.length > 0) {
    return { ok: false, stage: 'import', importErrors: imported.errors };
  }

  const result = runAllocation(
    { players: imported.players, matches: imported.matches, config },
    options
  );
  if (!result.success) {
    return { ok: false, stage: 'allocation', result };
  }

  return {
    ok: true,
    result,
    output: buildAllocationWorkbook(table, imported.players, result, sheetName),
  };
}

/**
 * One line per import error, e.g. "row 3, Spelare: Player number must be a whole number (x)"
 */
export function formatImportError(error: RosterImportError): string {
  const location = error.rowNumber !== undefined ? `row ${error.rowNumber}, ${error.field}` : error.field;
  const value = error.value !== undefined ? ` (${error.value})` : '';
  return `${location}: ${error.message}${value}`;
}
