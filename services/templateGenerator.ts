import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import { resolveConfig } from '../config';
import type { GenerationSummary, GeneratorConfig } from '../types';
import { createColorPicker } from '../utils/colorUtils';
import { logger } from '../utils/logger';
import { generateSheetRows } from './eventGenerator';
import type { WorkbookDropdowns } from './extDropdownReader';
import { writeOutputSheet } from './outputWriter';
import { buildStaffIndex } from './staffIndex';
import { loadWorkbookBuffer, loadWorkbookFile, readSheetGrid } from './workbookReader';

export interface GeneratedTemplate {
  workbook: Workbook;
  summary: GenerationSummary;
}

/**
 * Builds the booking template workbook from already loaded events and staff
 * workbooks. Sheet- and row-level problems end up in the summary; nothing
 * here throws for bad data. `eventDropdowns` are the extension-block list
 * validations of the events workbook, as read by the loaders.
 */
export const buildTemplate = (
  eventsWorkbook: Workbook,
  staffWorkbook: Workbook,
  overrides: Partial<GeneratorConfig> = {},
  eventDropdowns: WorkbookDropdowns = new Map()
): GeneratedTemplate => {
  const config = resolveConfig(overrides);
  const staffIndex = buildStaffIndex(staffWorkbook, config);
  const pickColor = createColorPicker(config);
  const workbook = new ExcelJS.Workbook();
  const summary: GenerationSummary = { sheets: [], skippedSheets: [] };

  eventsWorkbook.worksheets.forEach(worksheet => {
    if (!config.targetSheets.includes(worksheet.name.trim().toUpperCase())) return;

    const grid = readSheetGrid(worksheet, config, eventDropdowns.get(worksheet.name.trim().toLowerCase()));
    const result = generateSheetRows(grid, { workbook: eventsWorkbook, staffIndex, config, pickColor });
    if (!result.ok) {
      logger.warn(`Sheet "${worksheet.name}" skipped: ${result.reason}`);
      summary.skippedSheets.push({ sheet: worksheet.name, reason: result.reason });
      return;
    }

    writeOutputSheet(workbook, worksheet.name, result.rows, config.headerColor);
    summary.sheets.push(result.summary);
    logger.info(`Sheet "${worksheet.name}": ${result.summary.events} events, ${result.summary.rows} rows`);
  });

  return { workbook, summary };
};

export const generateOutput = async (
  eventsPath: string,
  staffPath: string,
  outputPath: string,
  overrides: Partial<GeneratorConfig> = {}
): Promise<GenerationSummary> => {
  const events = await loadWorkbookFile(eventsPath, 'events');
  const staff = await loadWorkbookFile(staffPath, 'staff');
  const { workbook, summary } = buildTemplate(events.workbook, staff.workbook, overrides, events.dropdowns);
  await workbook.xlsx.writeFile(outputPath);
  logger.info(`Output saved to ${outputPath}`);
  return summary;
};

export const generateOutputBuffer = async (
  events: ArrayBuffer,
  staff: ArrayBuffer,
  overrides: Partial<GeneratorConfig> = {}
): Promise<{ data: ArrayBuffer; summary: GenerationSummary }> => {
  const eventsWorkbook = await loadWorkbookBuffer(events, 'events');
  const staffWorkbook = await loadWorkbookBuffer(staff, 'staff');
  const { workbook, summary } = buildTemplate(
    eventsWorkbook.workbook,
    staffWorkbook.workbook,
    overrides,
    eventsWorkbook.dropdowns
  );
  const data = await workbook.xlsx.writeBuffer();
  return { data, summary };
};
