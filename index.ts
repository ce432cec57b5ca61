export { generateOutput, generateOutputBuffer, buildTemplate } from './services/templateGenerator';
export type { GeneratedTemplate } from './services/templateGenerator';
export { buildStaffIndex, lookupInstructors } from './services/staffIndex';
export { generateSheetRows } from './services/eventGenerator';
export { resolveDropdownOptions } from './services/dropdownResolver';
export { readExtDropdowns } from './services/extDropdownReader';
export type { DropdownRule, WorkbookDropdowns } from './services/extDropdownReader';
export { parseDropdownSource } from './utils/dropdownSource';
export { parseMonthToNum } from './utils/dateUtils';
export { cleanInstructorName } from './utils/cellUtils';
export { createColorPicker } from './utils/colorUtils';
export { resolveConfig } from './config';
export { DEFAULT_CONFIG, OUTPUT_HEADERS, TARGET_SHEETS } from './constants';
export type * from './types';
