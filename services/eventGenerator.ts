import type { Workbook } from 'exceljs';
import { HEADER_NAMES, MAX_DAY_COLUMNS } from '../constants';
import type {
  DerivedEvent,
  EventSourceRow,
  GeneratorConfig,
  GridCell,
  OutputRow,
  SheetGrid,
  SheetSummary,
  StaffIndex,
  TimeSlot,
} from '../types';
import { isBlank } from '../utils/cellUtils';
import type { ColorPicker } from '../utils/colorUtils';
import { formatOutputDate, parseDayHeader, parseMonthToNum } from '../utils/dateUtils';
import { logger } from '../utils/logger';
import { parseTimeSlot, slotKey } from '../utils/timeSlots';
import { resolveDropdownOptions } from './dropdownResolver';
import { lookupInstructors } from './staffIndex';

type ColumnKey = keyof typeof HEADER_NAMES;
export type ColumnMap = Partial<Record<ColumnKey, number>>;

const COLUMN_KEYS: ColumnKey[] = [
  'resort', 'activity', 'product', 'ageGroup', 'guestPrice', 'staffPrice', 'duration', 'bookableHours', 'month',
];

const REQUIRED_COLUMNS: { key: ColumnKey; label: string }[] = [
  { key: 'activity', label: 'Activity' },
  { key: 'month', label: 'Month' },
  { key: 'bookableHours', label: 'Bookable Hours' },
];

export interface SheetContext {
  workbook: Workbook;
  staffIndex: StaffIndex;
  config: GeneratorConfig;
  pickColor: ColorPicker;
}

export type SheetResult =
  | { ok: true; rows: OutputRow[]; summary: SheetSummary }
  | { ok: false; reason: string };

export const resolveColumns = (grid: SheetGrid): ColumnMap => {
  const headerMap = new Map<string, number>();
  for (let c = 1; c <= grid.columnCount; c++) {
    const header = grid.cell(1, c).text.toLowerCase();
    if (header && !headerMap.has(header)) headerMap.set(header, c);
  }

  const columns: ColumnMap = {};
  COLUMN_KEYS.forEach(key => {
    const col = HEADER_NAMES[key].map(name => headerMap.get(name)).find(c => c !== undefined);
    if (col !== undefined) columns[key] = col;
  });
  return columns;
};

const readRow = (grid: SheetGrid, r: number, columns: ColumnMap): EventSourceRow => {
  const at = (key: ColumnKey): GridCell | undefined => {
    const col = columns[key];
    return col === undefined ? undefined : grid.cell(r, col);
  };
  return {
    rowNumber: r,
    activity: at('activity')?.text ?? '',
    resort: at('resort')?.text ?? '',
    product: at('product')?.text ?? '',
    ageGroup: at('ageGroup')?.text ?? '',
    guestPrice: at('guestPrice')?.value ?? null,
    staffPrice: at('staffPrice')?.value ?? null,
    duration: at('duration')?.text ?? '',
    month: at('month')?.value ?? null,
    bookableHours: at('bookableHours') ?? { value: null, text: '', tag: 'none' },
  };
};

const signalsAvailability = (cell: GridCell, config: GeneratorConfig): boolean => {
  if (config.daySignal === 'fill') return cell.tag === 'available';
  if (typeof cell.value === 'number') return cell.value > 0;
  return /^\d+(\.\d+)?$/.test(cell.text) && parseFloat(cell.text) > 0;
};

/** Day of month from the first signaling day column after Month, or 1 when days are not signaled. */
export const resolveDay = (grid: SheetGrid, r: number, monthCol: number, config: GeneratorConfig): number | null => {
  if (config.daySignal === 'none') return 1;
  const lastCol = Math.min(grid.columnCount, monthCol + MAX_DAY_COLUMNS);
  for (let c = monthCol + 1; c <= lastCol; c++) {
    if (signalsAvailability(grid.cell(r, c), config)) {
      return parseDayHeader(grid.cell(1, c).value);
    }
  }
  return null;
};

const isChildAgeGroup = (ageGroup: string) => /8\s*-\s*12/.test(ageGroup) || /years/i.test(ageGroup);

/**
 * Event names for a row.
 *
 * 'resort': the activity, with " - {resort}" when the activity runs at more
 * than one resort on this sheet.
 * 'pricing': one name per priced audience (guest / staff). On the age-group
 * sheet names are "{activity} - {resort}" split by child age group; elsewhere
 * they are qualified by resort and product.
 */
export const buildEventNames = (
  row: EventSourceRow,
  sheet: string,
  config: Pick<GeneratorConfig, 'namingPolicy' | 'ageGroupSheet' | 'childStaffLabel'>,
  resortsByActivity: Map<string, Set<string>>
): string[] => {
  const { activity, resort, product, ageGroup } = row;
  if (!activity) return [];

  if (config.namingPolicy === 'resort') {
    const resorts = resortsByActivity.get(activity);
    return [resorts && resorts.size > 1 && resort ? `${activity} - ${resort}` : activity];
  }

  const names: string[] = [];
  const hasGuest = !isBlank(row.guestPrice);
  const hasStaff = !isBlank(row.staffPrice);

  if (sheet.trim().toUpperCase() === config.ageGroupSheet.toUpperCase()) {
    const base = `${activity} - ${resort}`;
    const child = isChildAgeGroup(ageGroup);
    if (hasGuest) names.push(child ? `${base} - Child` : base);
    if (hasStaff) names.push(child ? `${base} - ${config.childStaffLabel} - Child` : `${base} - Staff`);
    return names;
  }

  let base = resort ? `${activity} - ${resort}` : activity;
  if (product) base = `${base} - ${product}`;
  if (hasGuest) names.push(base);
  if (hasStaff) names.push(`${base} - Staff`);
  return names;
};

export const resolveTimeSlots = (
  cell: GridCell,
  ctx: Pick<SheetContext, 'workbook' | 'config'>,
  sheetName: string,
  issues: string[]
): TimeSlot[] => {
  const options = cell.dropdown
    ? resolveDropdownOptions(ctx.workbook, sheetName, cell.dropdown, issues)
    : cell.text ? [cell.text] : [];

  const seen = new Set<string>();
  const slots: TimeSlot[] = [];
  options.forEach(option => {
    const slot = parseTimeSlot(option, ctx.config.slotStrictness);
    if (!slot) {
      const msg = `Malformed time slot "${option}" dropped`;
      logger.warn(msg);
      issues.push(msg);
      return;
    }
    if (seen.has(slotKey(slot))) return;
    seen.add(slotKey(slot));
    slots.push(slot);
  });
  return slots;
};

const toRows = (event: DerivedEvent, instructors: string[], color: string): OutputRow[] => {
  const shared = {
    event: event.name,
    configuration: event.activity,
    date: event.date,
    startTime: event.slot.start,
    endTime: event.slot.end,
    color,
  };
  return [
    { kind: 'event', resource: event.activity, ...shared },
    ...instructors.map((instr): OutputRow => ({ kind: 'instructor', resource: instr, ...shared })),
  ];
};

export const generateSheetRows = (grid: SheetGrid, ctx: SheetContext): SheetResult => {
  const { config } = ctx;
  const columns = resolveColumns(grid);
  const missing = REQUIRED_COLUMNS.filter(({ key }) => columns[key] === undefined).map(({ label }) => label);
  const monthCol = columns.month;
  if (missing.length > 0 || monthCol === undefined) {
    return { ok: false, reason: `Missing required column(s): ${missing.join(', ')}` };
  }

  const sourceRows: EventSourceRow[] = [];
  for (let r = 2; r <= grid.rowCount; r++) sourceRows.push(readRow(grid, r, columns));

  const resortsByActivity = new Map<string, Set<string>>();
  sourceRows.forEach(row => {
    if (!row.activity) return;
    if (!resortsByActivity.has(row.activity)) resortsByActivity.set(row.activity, new Set());
    if (row.resort) resortsByActivity.get(row.activity)?.add(row.resort);
  });

  const isMultiDaySheet = grid.name.trim().toUpperCase() === config.multiDaySheet.toUpperCase();
  const emitted = new Set<string>();
  const rows: OutputRow[] = [];
  const issues: string[] = [];
  let events = 0;

  const skip = (row: EventSourceRow, reason: string) => {
    const msg = `${grid.name} row ${row.rowNumber}: ${reason}`;
    logger.warn(msg);
    issues.push(msg);
  };

  for (const row of sourceRows) {
    if (!row.activity) continue;

    if (isMultiDaySheet && row.duration.toLowerCase().includes('day')) {
      logger.debug(`${grid.name} row ${row.rowNumber}: multi-day "${row.activity}" excluded`);
      continue;
    }

    const month = parseMonthToNum(row.month);
    if (month === null) {
      skip(row, `unrecognized month "${row.month === null ? '' : String(row.month)}"`);
      continue;
    }
    const day = resolveDay(grid, row.rowNumber, monthCol, config);
    if (day === null) {
      skip(row, 'no available day');
      continue;
    }
    const date = formatOutputDate(config.year, month, day);
    if (!date) {
      skip(row, `day ${day} does not exist in month ${month}`);
      continue;
    }

    const names = buildEventNames(row, grid.name, config, resortsByActivity);
    if (names.length === 0) {
      skip(row, 'no event name (no guest or staff price)');
      continue;
    }

    const rowIssues: string[] = [];
    const slots = resolveTimeSlots(row.bookableHours, ctx, grid.name, rowIssues);
    rowIssues.forEach(issue => issues.push(`${grid.name} row ${row.rowNumber}: ${issue}`));
    if (slots.length === 0) {
      skip(row, 'no bookable time slot');
      continue;
    }

    const instructors = lookupInstructors(ctx.staffIndex, grid.name, row.activity);
    for (const name of names) {
      for (const slot of slots) {
        const key = [name, row.resort, row.activity, date, slot.start, slot.end].join('\u0000');
        if (emitted.has(key)) continue;
        emitted.add(key);

        const event: DerivedEvent = { name, date, slot, activity: row.activity, resort: row.resort };
        rows.push(...toRows(event, instructors, ctx.pickColor(name)));
        events++;
      }
    }
  }

  return { ok: true, rows, summary: { sheet: grid.name, rows: rows.length, events, issues } };
};
