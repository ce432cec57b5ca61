import type { Workbook } from 'exceljs';
import type { GeneratorConfig, SheetGrid, StaffIndex } from '../types';
import { cleanInstructorName } from '../utils/cellUtils';
import { logger } from '../utils/logger';
import { findWorksheet, readSheetGrid } from './workbookReader';

export const buildSheetStaffMap = (grid: SheetGrid): Record<string, string[]> => {
  let instrStartCol = 1;
  for (let c = 1; c <= grid.columnCount; c++) {
    if (grid.cell(1, c).text.toLowerCase() === 'priority') {
      instrStartCol = c + 1;
      break;
    }
  }

  const sheetMap: Record<string, string[]> = {};
  for (let col = instrStartCol; col <= grid.columnCount; col++) {
    const instrName = cleanInstructorName(grid.cell(1, col).text);
    if (!instrName) continue;

    for (let r = 2; r <= grid.rowCount; r++) {
      const cell = grid.cell(r, col);
      if (!cell.text) break;
      if (cell.tag === 'excluded') continue;
      if (!sheetMap[cell.text]) sheetMap[cell.text] = [];
      sheetMap[cell.text].push(instrName);
    }
  }
  return sheetMap;
};

/** {sheet -> {activity -> [instructors]}} for every target sheet present in the staff workbook. */
export const buildStaffIndex = (
  workbook: Workbook,
  config: Pick<GeneratorConfig, 'targetSheets' | 'availableColor' | 'excludeColor'>
): StaffIndex => {
  const index: StaffIndex = {};
  for (const sheet of config.targetSheets) {
    const worksheet = findWorksheet(workbook, sheet);
    if (!worksheet) {
      logger.debug(`Staff workbook has no "${sheet}" sheet`);
      continue;
    }
    index[sheet.toUpperCase()] = buildSheetStaffMap(readSheetGrid(worksheet, config));
  }
  return index;
};

export const lookupInstructors = (index: StaffIndex, sheet: string, activity: string): string[] =>
  index[sheet.toUpperCase()]?.[activity] ?? [];
