import { readFile } from 'node:fs/promises';
import ExcelJS from 'exceljs';
import type { DataValidation, Workbook, Worksheet } from 'exceljs';
import type { DropdownSource, GeneratorConfig, GridCell, SheetGrid } from '../types';
import { rangeContains } from '../utils/cellRefs';
import { safeStr, tagForFill, toPrimitive } from '../utils/cellUtils';
import { parseDropdownSource } from '../utils/dropdownSource';
import { readExtDropdowns } from './extDropdownReader';
import type { DropdownRule, WorkbookDropdowns } from './extDropdownReader';

export type WorkbookRole = 'events' | 'staff';

const EMPTY_CELL: GridCell = { value: null, text: '', tag: 'none' };

const describeError = (err: unknown) => (err instanceof Error ? err.message : String(err));

export interface LoadedWorkbook {
  workbook: Workbook;
  dropdowns: WorkbookDropdowns;
}

export const loadWorkbookFile = async (path: string, role: WorkbookRole): Promise<LoadedWorkbook> => {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(path);
    const dropdowns = await readExtDropdowns(await readFile(path));
    return { workbook, dropdowns };
  } catch (err) {
    throw new Error(`Could not read ${role} workbook "${path}": ${describeError(err)}`, { cause: err });
  }
};

export const loadWorkbookBuffer = async (data: ArrayBuffer, role: WorkbookRole): Promise<LoadedWorkbook> => {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(data);
    const dropdowns = await readExtDropdowns(data);
    return { workbook, dropdowns };
  } catch (err) {
    throw new Error(`Could not read ${role} workbook: ${describeError(err)}`, { cause: err });
  }
};

export const findWorksheet = (workbook: Workbook, name: string): Worksheet | undefined => {
  const wanted = name.trim().toLowerCase();
  return workbook.worksheets.find(ws => ws.name.trim().toLowerCase() === wanted);
};

const dropdownFor = (validation: DataValidation | undefined): DropdownSource | undefined => {
  if (!validation || validation.type !== 'list') return undefined;
  const formula: unknown = validation.formulae[0];
  const text = typeof formula === 'string' ? formula : '';
  return parseDropdownSource(text) ?? { kind: 'unsupported', formula: text };
};

/**
 * Loads a worksheet into a 1-based grid. Fill colors are turned into cell
 * tags and list validations into dropdown sources here, once. `extRules`
 * carries the extension-block validations ExcelJS skips.
 */
export const readSheetGrid = (
  worksheet: Worksheet,
  colors: Pick<GeneratorConfig, 'availableColor' | 'excludeColor'>,
  extRules: DropdownRule[] = []
): SheetGrid => {
  const rowCount = worksheet.rowCount;
  const columnCount = worksheet.columnCount;
  const cells: GridCell[][] = [];

  for (let r = 1; r <= rowCount; r++) {
    const row: GridCell[] = [];
    for (let c = 1; c <= columnCount; c++) {
      const cell = worksheet.getCell(r, c);
      const value = toPrimitive(cell.value);
      const gridCell: GridCell = { value, text: safeStr(value), tag: tagForFill(cell.fill, colors) };
      const dropdown =
        dropdownFor(cell.dataValidation) ?? extRules.find(rule => rangeContains(rule.bounds, r - 1, c - 1))?.source;
      if (dropdown) gridCell.dropdown = dropdown;
      row.push(gridCell);
    }
    cells.push(row);
  }

  return {
    name: worksheet.name,
    rowCount,
    columnCount,
    cell: (row, col) => cells[row - 1]?.[col - 1] ?? EMPTY_CELL,
  };
};
