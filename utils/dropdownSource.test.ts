import { describe, expect, it } from 'vitest';
import { parseDropdownSource } from './dropdownSource';

describe('parseDropdownSource', () => {
  it('parses inline lists', () => {
    expect(parseDropdownSource('"09:00 - 10:00, 17:00 - 18:00,"')).toEqual({
      kind: 'inline',
      options: ['09:00 - 10:00', '17:00 - 18:00'],
    });
  });

  it('parses same-sheet ranges', () => {
    expect(parseDropdownSource('$H$1:$H$4')).toEqual({ kind: 'range', range: '$H$1:$H$4' });
    expect(parseDropdownSource('=B2')).toEqual({ kind: 'range', range: 'B2' });
  });

  it('parses cross-sheet ranges with quoted names', () => {
    expect(parseDropdownSource('Lists!$A$1:$A$3')).toEqual({ kind: 'range', sheet: 'Lists', range: '$A$1:$A$3' });
    expect(parseDropdownSource("'Time Lists'!A1:A3")).toEqual({ kind: 'range', sheet: 'Time Lists', range: 'A1:A3' });
  });

  it('parses whole-column and whole-row ranges', () => {
    expect(parseDropdownSource('Lists!$A:$A')).toEqual({ kind: 'range', sheet: 'Lists', range: '$A:$A' });
    expect(parseDropdownSource('2:3')).toEqual({ kind: 'range', range: '2:3' });
  });

  it('parses defined names', () => {
    expect(parseDropdownSource('MorningSlots')).toEqual({ kind: 'named', name: 'MorningSlots' });
  });

  it('gives up on other formulas', () => {
    expect(parseDropdownSource('INDIRECT(A1)')).toBeUndefined();
    expect(parseDropdownSource('Lists!OFFSET(A1,0,0)')).toBeUndefined();
    expect(parseDropdownSource('')).toBeUndefined();
  });
});
