import * as XLSX from 'xlsx';

const CELL_SPAN = /^[A-Z]{1,3}\d+(:[A-Z]{1,3}\d+)?$/;
const COLUMN_SPAN = /^([A-Z]{1,3}):([A-Z]{1,3})$/;
const ROW_SPAN = /^(\d+):(\d+)$/;

export interface SheetLimits {
  lastRow: number; // 0-based
  lastCol: number; // 0-based
}

export const EXCEL_LIMITS: SheetLimits = { lastRow: 1048575, lastCol: 16383 };

/**
 * 0-based bounds of an A1 reference (`B2`, `$A$1:$A$9`, `A:A`, `3:5`).
 * Column-only and row-only spans run to the given limits.
 */
export const decodeRef = (ref: string, limits: SheetLimits = EXCEL_LIMITS): XLSX.Range | undefined => {
  const a1 = ref.trim().replace(/\$/g, '').toUpperCase();
  if (CELL_SPAN.test(a1)) return XLSX.utils.decode_range(a1);

  const cols = a1.match(COLUMN_SPAN);
  if (cols) {
    return {
      s: { r: 0, c: XLSX.utils.decode_col(cols[1]) },
      e: { r: limits.lastRow, c: XLSX.utils.decode_col(cols[2]) },
    };
  }

  const rows = a1.match(ROW_SPAN);
  if (rows) {
    return {
      s: { r: XLSX.utils.decode_row(rows[1]), c: 0 },
      e: { r: XLSX.utils.decode_row(rows[2]), c: limits.lastCol },
    };
  }
  return undefined;
};

export const isCellRef = (ref: string) => decodeRef(ref) !== undefined;

export const rangeContains = (range: XLSX.Range, row: number, col: number) =>
  row >= range.s.r && row <= range.e.r && col >= range.s.c && col <= range.e.c;
