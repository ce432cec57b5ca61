import type { CellValue, Fill } from 'exceljs';
import type { CellPrimitive, CellTag } from '../types';

export const safeStr = (value: CellPrimitive | undefined): string => {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return isNaN(value.getTime()) ? '' : value.toISOString().substring(0, 10);
  return String(value).trim();
};

export const isBlank = (value: CellPrimitive | undefined) => safeStr(value) === '';

// Flattens rich text, hyperlinks and formula results down to a plain value.
export const toPrimitive = (value: CellValue): CellPrimitive => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  if ('richText' in value) return value.richText.map(part => part.text).join('');
  if ('hyperlink' in value) return value.text;
  if ('result' in value) return value.result === undefined ? null : toPrimitive(value.result);
  return null;
};

export const normalizeArgb = (color: string | undefined): string | undefined => {
  if (!color) return undefined;
  const hex = color.trim().toUpperCase();
  if (/^[0-9A-F]{6}$/.test(hex)) return `FF${hex}`;
  return /^[0-9A-F]{8}$/.test(hex) ? hex : undefined;
};

export const fillArgb = (fill: Fill | undefined): string | undefined => {
  if (!fill || fill.type !== 'pattern') return undefined;
  return normalizeArgb(fill.fgColor?.argb);
};

export const tagForFill = (
  fill: Fill | undefined,
  colors: { availableColor: string; excludeColor: string }
): CellTag => {
  const argb = fillArgb(fill);
  if (!argb) return 'none';
  if (argb === normalizeArgb(colors.availableColor)) return 'available';
  if (argb === normalizeArgb(colors.excludeColor)) return 'excluded';
  return 'none';
};

// A note between words leaves one space: "Jane (PT) Doe" -> "Jane Doe".
export const cleanInstructorName = (name: string): string =>
  name.replace(/\s*\([^)]*\)\s*/g, ' ').replace(/\s+/g, ' ').trim();
