import type { GeneratorConfig } from '../types';

// 32-bit FNV-1a
const hashName = (name: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < name.length; i++) {
    hash ^= name.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
};

export type ColorPicker = (eventName: string) => string;

/**
 * Returns a picker that assigns each event name one palette color for the
 * lifetime of the picker.
 */
export const createColorPicker = (
  config: Pick<GeneratorConfig, 'palette' | 'colorStrategy' | 'random'>
): ColorPicker => {
  const { palette, colorStrategy, random } = config;
  if (palette.length === 0) throw new Error('Event color palette is empty.');
  const cache = new Map<string, string>();

  return (eventName: string) => {
    const cached = cache.get(eventName);
    if (cached) return cached;
    const idx = colorStrategy === 'random'
      ? Math.min(palette.length - 1, Math.floor(random() * palette.length))
      : hashName(eventName) % palette.length;
    const color = palette[idx];
    cache.set(eventName, color);
    return color;
  };
};
