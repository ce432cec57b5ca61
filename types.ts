export type CellTag = 'available' | 'excluded' | 'none';

export type CellPrimitive = string | number | boolean | Date | null;

export type DropdownSource =
  | { kind: 'inline'; options: string[] }
  | { kind: 'range'; sheet?: string; range: string }
  | { kind: 'named'; name: string }
  | { kind: 'unsupported'; formula: string };

export interface GridCell {
  value: CellPrimitive;
  text: string;
  tag: CellTag;
  dropdown?: DropdownSource;
}

export interface SheetGrid {
  name: string;
  rowCount: number;
  columnCount: number;
  cell: (row: number, col: number) => GridCell;
}

// sheet id -> activity -> instructor names (column order)
export type StaffIndex = Record<string, Record<string, string[]>>;

export type DaySignal = 'fill' | 'numeric' | 'none';
export type NamingPolicy = 'resort' | 'pricing';
export type SlotStrictness = 'strict' | 'lenient';
export type ColorStrategy = 'hash' | 'random';

export interface GeneratorConfig {
  targetSheets: string[];
  multiDaySheet: string;
  ageGroupSheet: string; // 'pricing' names on this sheet follow age groups, not products
  childStaffLabel: string;
  availableColor: string; // ARGB
  excludeColor: string; // ARGB
  headerColor: string;
  palette: string[];
  year: number;
  daySignal: DaySignal;
  namingPolicy: NamingPolicy;
  slotStrictness: SlotStrictness;
  colorStrategy: ColorStrategy;
  random: () => number;
}

export interface EventSourceRow {
  rowNumber: number;
  activity: string;
  resort: string;
  product: string;
  ageGroup: string;
  guestPrice: CellPrimitive;
  staffPrice: CellPrimitive;
  duration: string;
  month: CellPrimitive;
  bookableHours: GridCell;
}

export interface TimeSlot {
  start: string;
  end: string;
}

export interface DerivedEvent {
  name: string;
  date: string; // DD/MM/YYYY
  slot: TimeSlot;
  activity: string;
  resort: string;
}

export interface OutputRow {
  kind: 'event' | 'instructor';
  event: string;
  resource: string;
  configuration: string;
  date: string;
  startTime: string;
  endTime: string;
  color: string;
}

export interface SheetSummary {
  sheet: string;
  rows: number;
  events: number;
  issues: string[];
}

export interface GenerationSummary {
  sheets: SheetSummary[];
  skippedSheets: { sheet: string; reason: string }[];
}
