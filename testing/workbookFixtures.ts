import ExcelJS from 'exceljs';
import type { Cell, Workbook, Worksheet } from 'exceljs';
import JSZip from 'jszip';

export const GREEN = 'FF00B050';
export const RED = 'FFC00000';

export const EVENT_HEADERS = ['Resort Name', 'Activity', 'Activity Duration', 'Bookable Hours', 'Month', 1, 2, 3, 4, 5];

type Value = string | number | null;

export const paint = (cell: Cell, argb: string) => {
  cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb } };
};

export const listValidation = (cell: Cell, formula: string) => {
  cell.dataValidation = { type: 'list', allowBlank: true, formulae: [formula] };
};

export const addSheet = (workbook: Workbook, name: string, rows: Value[][]): Worksheet => {
  const worksheet = workbook.addWorksheet(name);
  rows.forEach(row => worksheet.addRow(row));
  return worksheet;
};

export interface EventRowSpec {
  resort?: string;
  activity: string;
  duration?: string;
  hours: string;
  month: Value;
  // 1-based day column to paint green
  day?: number;
  dropdown?: string;
}

/**
 * Events sheet laid out as EVENT_HEADERS: five day columns (1-5) follow Month.
 */
export const addEventsSheet = (workbook: Workbook, name: string, specs: EventRowSpec[]): Worksheet => {
  const worksheet = addSheet(workbook, name, [EVENT_HEADERS]);
  specs.forEach((spec, idx) => {
    const r = idx + 2;
    worksheet.getRow(r).values = [
      spec.resort ?? null,
      spec.activity,
      spec.duration ?? '1 hour',
      spec.hours,
      spec.month,
      null, null, null, null, null,
    ];
    if (spec.day !== undefined) paint(worksheet.getCell(r, 5 + spec.day), GREEN);
    if (spec.dropdown !== undefined) listValidation(worksheet.getCell(r, 4), spec.dropdown);
  });
  return worksheet;
};

export const newWorkbook = () => new ExcelJS.Workbook();

/**
 * Adds a list validation the way Excel 2010+ stores cross-sheet lists: in the
 * worksheet's x14 extension block, which ExcelJS neither writes nor reads.
 */
export const withExtListValidation = async (
  data: ArrayBuffer,
  sheetPart: string,
  formula: string,
  sqref: string
): Promise<ArrayBuffer> => {
  const zip = await JSZip.loadAsync(data);
  const path = `xl/worksheets/${sheetPart}`;
  const xml = await zip.file(path)?.async('string');
  if (!xml) throw new Error(`workbook has no ${path}`);

  const ext =
    '<extLst><ext uri="{CCE6A557-97BC-4b89-ADB6-D9C93CAAB3DF}" ' +
    'xmlns:x14="http://schemas.microsoft.com/office/spreadsheetml/2009/9/main">' +
    '<x14:dataValidations xmlns:xm="http://schemas.microsoft.com/office/excel/2006/main" count="1">' +
    `<x14:dataValidation type="list" allowBlank="1"><x14:formula1><xm:f>${formula}</xm:f></x14:formula1>` +
    `<xm:sqref>${sqref}</xm:sqref></x14:dataValidation></x14:dataValidations></ext></extLst>`;
  zip.file(path, xml.replace('</worksheet>', `${ext}</worksheet>`));
  return zip.generateAsync({ type: 'arraybuffer' });
};
