import { describe, expect, it } from 'vitest';
import { addSheet, newWorkbook } from '../testing/workbookFixtures';
import { resolveDropdownOptions } from './dropdownResolver';

const slotsWorkbook = () => {
  const workbook = newWorkbook();
  const akun = addSheet(workbook, 'AKUN', [['Activity']]);
  akun.getCell('H1').value = '07:00 - 08:00';
  akun.getCell('H3').value = '12:00 - 13:00';
  addSheet(workbook, 'Time Lists', [['09:00 - 10:00'], ['17:00 - 18:00']]);
  return workbook;
};

describe('resolveDropdownOptions', () => {
  it('returns inline options as given', () => {
    const options = resolveDropdownOptions(newWorkbook(), 'AKUN', { kind: 'inline', options: ['a - b'] });
    expect(options).toEqual(['a - b']);
  });

  it('reads non-empty cells of a same-sheet range', () => {
    const options = resolveDropdownOptions(slotsWorkbook(), 'AKUN', { kind: 'range', range: '$H$1:$H$3' });
    expect(options).toEqual(['07:00 - 08:00', '12:00 - 13:00']);
  });

  it('reads a range on another sheet', () => {
    const options = resolveDropdownOptions(slotsWorkbook(), 'AKUN', {
      kind: 'range',
      sheet: 'time lists',
      range: 'A1:A2',
    });
    expect(options).toEqual(['09:00 - 10:00', '17:00 - 18:00']);
  });

  it('bounds whole-column and whole-row ranges by the used area', () => {
    const workbook = slotsWorkbook();
    expect(resolveDropdownOptions(workbook, 'AKUN', { kind: 'range', sheet: 'Time Lists', range: '$A:$A' })).toEqual([
      '09:00 - 10:00',
      '17:00 - 18:00',
    ]);
    expect(resolveDropdownOptions(workbook, 'AKUN', { kind: 'range', range: '1:1' })).toEqual(['Activity', '07:00 - 08:00']);
  });

  it('follows workbook-level defined names', () => {
    const workbook = slotsWorkbook();
    workbook.definedNames.add("'Time Lists'!$A$1:$A$2", 'DaySlots');

    const options = resolveDropdownOptions(workbook, 'AKUN', { kind: 'named', name: 'DaySlots' });
    expect(options).toEqual(['09:00 - 10:00', '17:00 - 18:00']);
  });

  it('gives no options for a missing sheet, name or unsupported formula and records why', () => {
    const issues: string[] = [];
    const workbook = slotsWorkbook();

    expect(resolveDropdownOptions(workbook, 'AKUN', { kind: 'range', sheet: 'Gone', range: 'A1' }, issues)).toEqual([]);
    expect(resolveDropdownOptions(workbook, 'AKUN', { kind: 'named', name: 'Nope' }, issues)).toEqual([]);
    expect(resolveDropdownOptions(workbook, 'AKUN', { kind: 'unsupported', formula: 'INDIRECT(A1)' }, issues)).toEqual([]);
    expect(issues).toEqual([
      'Dropdown range Gone!A1 points at a missing sheet',
      'Dropdown named range "Nope" is not defined',
      'Dropdown formula "INDIRECT(A1)" is not supported',
    ]);
  });
});
