import type { Workbook } from 'exceljs';
import type { DropdownSource } from '../types';
import { decodeRef } from '../utils/cellRefs';
import { safeStr, toPrimitive } from '../utils/cellUtils';
import { parseDropdownSource } from '../utils/dropdownSource';
import { logger } from '../utils/logger';
import { findWorksheet } from './workbookReader';

const readRange = (workbook: Workbook, sheetName: string, range: string, issues: string[]): string[] => {
  const worksheet = findWorksheet(workbook, sheetName);
  if (!worksheet) {
    const msg = `Dropdown range ${sheetName}!${range} points at a missing sheet`;
    logger.warn(msg);
    issues.push(msg);
    return [];
  }

  const bounds = decodeRef(range, { lastRow: worksheet.rowCount - 1, lastCol: worksheet.columnCount - 1 });
  if (!bounds) {
    const msg = `Dropdown range ${sheetName}!${range} is not a cell reference`;
    logger.warn(msg);
    issues.push(msg);
    return [];
  }

  const { s, e } = bounds;
  const lastRow = Math.min(e.r, worksheet.rowCount - 1);
  const lastCol = Math.min(e.c, worksheet.columnCount - 1);
  const options: string[] = [];
  for (let r = s.r; r <= lastRow; r++) {
    for (let c = s.c; c <= lastCol; c++) {
      const text = safeStr(toPrimitive(worksheet.getCell(r + 1, c + 1).value));
      if (text) options.push(text);
    }
  }
  return options;
};

/**
 * Every option a list validation offers, whatever the cell currently holds.
 * Unresolvable sheets, names or formulas give no options; the reason is pushed to issues.
 */
export const resolveDropdownOptions = (
  workbook: Workbook,
  currentSheet: string,
  source: DropdownSource,
  issues: string[] = []
): string[] => {
  switch (source.kind) {
    case 'inline':
      return source.options;
    case 'range':
      return readRange(workbook, source.sheet ?? currentSheet, source.range, issues);
    case 'named': {
      const { ranges } = workbook.definedNames.getRanges(source.name);
      if (ranges.length === 0) {
        const msg = `Dropdown named range "${source.name}" is not defined`;
        logger.warn(msg);
        issues.push(msg);
        return [];
      }
      return ranges.flatMap(ref => {
        const target = parseDropdownSource(ref);
        if (!target || target.kind !== 'range') {
          const msg = `Named range "${source.name}" has an unsupported reference ${ref}`;
          logger.warn(msg);
          issues.push(msg);
          return [];
        }
        return readRange(workbook, target.sheet ?? currentSheet, target.range, issues);
      });
    }
    case 'unsupported': {
      const msg = `Dropdown formula "${source.formula}" is not supported`;
      logger.warn(msg);
      issues.push(msg);
      return [];
    }
  }
};
