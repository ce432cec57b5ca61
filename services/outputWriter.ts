import type { Fill, Workbook, Worksheet } from 'exceljs';
import { OUTPUT_HEADERS } from '../constants';
import type { OutputRow } from '../types';

const COLUMN_WIDTHS = [40, 24, 24, 12, 12, 12];

const solidFill = (argb: string): Fill => ({ type: 'pattern', pattern: 'solid', fgColor: { argb } });

export const addHeaders = (worksheet: Worksheet, headerColor: string) => {
  const header = worksheet.getRow(1);
  OUTPUT_HEADERS.forEach((title, idx) => {
    const cell = header.getCell(idx + 1);
    cell.value = title;
    cell.font = { bold: true };
    cell.fill = solidFill(headerColor);
  });
  COLUMN_WIDTHS.forEach((width, idx) => {
    worksheet.getColumn(idx + 1).width = width;
  });
};

export const writeOutputSheet = (
  workbook: Workbook,
  sheetName: string,
  rows: OutputRow[],
  headerColor: string
): Worksheet => {
  const worksheet = workbook.addWorksheet(sheetName);
  addHeaders(worksheet, headerColor);

  rows.forEach((row, idx) => {
    const out = worksheet.getRow(idx + 2);
    [row.event, row.resource, row.configuration, row.date, row.startTime, row.endTime].forEach((value, col) => {
      const cell = out.getCell(col + 1);
      cell.value = value;
      cell.fill = solidFill(row.color);
    });
  });
  return worksheet;
};
