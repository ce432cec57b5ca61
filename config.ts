import { DEFAULT_CONFIG } from './constants';
import { GeneratorConfig } from './types';

const yearFromEnv = (): number | undefined => {
  const raw = process.env.OUTPUT_YEAR?.trim();
  if (!raw) return undefined;
  const year = parseInt(raw, 10);
  return /^\d{4}$/.test(raw) && year > 0 ? year : undefined;
};

export const resolveConfig = (overrides: Partial<GeneratorConfig> = {}): GeneratorConfig => {
  const envYear = yearFromEnv();
  return {
    ...DEFAULT_CONFIG,
    ...(envYear !== undefined ? { year: envYear } : {}),
    ...overrides,
    targetSheets: (overrides.targetSheets ?? DEFAULT_CONFIG.targetSheets).map(s => s.toUpperCase()),
    multiDaySheet: (overrides.multiDaySheet ?? DEFAULT_CONFIG.multiDaySheet).toUpperCase(),
    ageGroupSheet: (overrides.ageGroupSheet ?? DEFAULT_CONFIG.ageGroupSheet).toUpperCase(),
  };
};
