import { format, isExists } from 'date-fns';
import * as XLSX from 'xlsx';
import { MONTH_MAP } from '../constants';
import type { CellPrimitive } from '../types';

const isMonthNumber = (n: number) => Number.isInteger(n) && n >= 1 && n <= 12;

/**
 * Month number (1-12) from a month cell.
 *
 * Accepts names and abbreviations ("September", "Sep", "sept."), numerals
 * ("9", "09"), year-suffixed text ("Sept 2025"), date cells and Excel date
 * serials. Anything else yields null.
 */
export const parseMonthToNum = (val: CellPrimitive): number | null => {
  if (val === null || typeof val === 'boolean') return null;
  if (val instanceof Date) {
    return isNaN(val.getTime()) ? null : val.getUTCMonth() + 1;
  }
  if (typeof val === 'number') {
    if (isMonthNumber(val)) return val;
    if (val > 31) {
      const code = XLSX.SSF.parse_date_code(val);
      return code && isMonthNumber(code.m) ? code.m : null;
    }
    return null;
  }

  const strVal = val.trim().toLowerCase().replace(/[.,;:]+$/, '');
  if (!strVal) return null;
  if (/^\d+$/.test(strVal)) {
    const n = parseInt(strVal, 10);
    return isMonthNumber(n) ? n : null;
  }

  for (const word of strVal.match(/[a-z]+/g) ?? []) {
    if (MONTH_MAP[word] !== undefined) return MONTH_MAP[word];
  }

  const numeral = strVal.match(/\b(1[0-2]|0?[1-9])\b/);
  return numeral ? parseInt(numeral[1], 10) : null;
};

// Day-of-month from a day column header ("5", 5, "05").
export const parseDayHeader = (val: CellPrimitive): number | null => {
  if (typeof val === 'number') return Number.isInteger(val) && val >= 1 && val <= 31 ? val : null;
  if (typeof val !== 'string' || !/^\s*\d{1,2}\s*$/.test(val)) return null;
  const day = parseInt(val, 10);
  return day >= 1 && day <= 31 ? day : null;
};

/** DD/MM/YYYY, or null when the day does not exist in that month. */
export const formatOutputDate = (year: number, month: number, day: number): string | null => {
  if (!isExists(year, month - 1, day)) return null;
  return format(new Date(year, month - 1, day), 'dd/MM/yyyy');
};
