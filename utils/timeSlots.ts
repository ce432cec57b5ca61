import type { SlotStrictness, TimeSlot } from '../types';

/**
 * Splits "09:00 - 10:00" on its first hyphen. Text without a hyphen is
 * rejected under 'strict' and becomes a start-only slot under 'lenient'.
 */
export const parseTimeSlot = (text: string, strictness: SlotStrictness): TimeSlot | null => {
  const trimmed = text.trim();
  if (!trimmed) return null;
  const idx = trimmed.indexOf('-');
  if (idx === -1) {
    return strictness === 'lenient' ? { start: trimmed, end: '' } : null;
  }
  const start = trimmed.substring(0, idx).trim();
  const end = trimmed.substring(idx + 1).trim();
  if (!start) return null;
  return { start, end };
};

export const slotKey = (slot: TimeSlot) => `${slot.start}|${slot.end}`;
