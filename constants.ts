import { GeneratorConfig } from './types';

export const TARGET_SHEETS: string[] = ['AKUN', 'WAMA', 'GALAXEA'];

export const OUTPUT_HEADERS = ['Event', 'Resource', 'Configuration', 'Date', 'Start Time', 'End Time'];

export const EVENT_COLORS = [
  'FFFFE5CC', // Peach
  'FFE5FFCC', // Lime
  'FFCCFFE5', // Mint
  'FFCCE5FF', // Sky
  'FFFFCCFF', // Pink
  'FFE5CCFF', // Lavender
  'FFFFCCCC', // Rose
  'FFCCFFFF', // Aqua
];

export const HEADER_NAMES = {
  resort: ['resort name'],
  activity: ['activity'],
  product: ['product'],
  ageGroup: ['age group'],
  guestPrice: ['guest price'],
  staffPrice: ['staff price'],
  duration: ['activity duration'],
  bookableHours: ['bookable hours', 'timing availability'],
  month: ['month'],
};

export const MAX_DAY_COLUMNS = 31;

export const MONTH_MAP: Record<string, number> = {
  january: 1, jan: 1,
  february: 2, feb: 2,
  march: 3, mar: 3,
  april: 4, apr: 4,
  may: 5,
  june: 6, jun: 6,
  july: 7, jul: 7,
  august: 8, aug: 8,
  september: 9, sep: 9, sept: 9,
  october: 10, oct: 10,
  november: 11, nov: 11,
  december: 12, dec: 12,
};

export const DEFAULT_CONFIG: GeneratorConfig = {
  targetSheets: TARGET_SHEETS,
  multiDaySheet: 'GALAXEA',
  ageGroupSheet: 'AKUN',
  childStaffLabel: 'RSG Staff',
  availableColor: 'FF00B050',
  excludeColor: 'FFC00000',
  headerColor: 'FFFFFF00',
  palette: EVENT_COLORS,
  year: 2025,
  daySignal: 'fill',
  namingPolicy: 'resort',
  slotStrictness: 'strict',
  colorStrategy: 'hash',
  random: Math.random,
};
