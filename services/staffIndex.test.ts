import { describe, expect, it } from 'vitest';
import { resolveConfig } from '../config';
import { RED, addSheet, newWorkbook, paint } from '../testing/workbookFixtures';
import { buildStaffIndex, lookupInstructors } from './staffIndex';

const config = resolveConfig();

describe('buildStaffIndex', () => {
  it('stops each instructor column at the first blank cell', () => {
    const workbook = newWorkbook();
    addSheet(workbook, 'AKUN', [['Jane Doe (Lead)'], ['Yoga'], ['Pilates'], [null], ['Surf']]);

    expect(buildStaffIndex(workbook, config)).toEqual({
      AKUN: { Yoga: ['Jane Doe'], Pilates: ['Jane Doe'] },
    });
  });

  it('starts instructor columns after Priority and keeps column order', () => {
    const workbook = newWorkbook();
    addSheet(workbook, 'WAMA', [
      ['PRIORITY', 'Ann (Senior)', 'Bob', ''],
      ['1', 'Yoga', 'Yoga', 'Ignored'],
      ['2', 'Surf', null, null],
    ]);

    expect(buildStaffIndex(workbook, config).WAMA).toEqual({
      Yoga: ['Ann', 'Bob'],
      Surf: ['Ann'],
    });
  });

  it('skips excluded cells without ending the column', () => {
    const workbook = newWorkbook();
    const sheet = addSheet(workbook, 'AKUN', [['Bob'], ['Yoga'], ['Surf']]);
    paint(sheet.getCell('A2'), RED);

    expect(buildStaffIndex(workbook, config).AKUN).toEqual({ Surf: ['Bob'] });
  });

  it('matches sheet names case-insensitively and ignores others', () => {
    const workbook = newWorkbook();
    addSheet(workbook, 'galaxea', [['Cy'], ['Dive']]);
    addSheet(workbook, 'Notes', [['Dee'], ['Dive']]);

    const index = buildStaffIndex(workbook, config);
    expect(Object.keys(index)).toEqual(['GALAXEA']);
    expect(lookupInstructors(index, 'Galaxea', 'Dive')).toEqual(['Cy']);
  });
});

describe('lookupInstructors', () => {
  it('returns an empty list for unknown sheets and activities', () => {
    const index = { AKUN: { Yoga: ['Jane Doe'] } };
    expect(lookupInstructors(index, 'WAMA', 'Yoga')).toEqual([]);
    expect(lookupInstructors(index, 'AKUN', 'yoga')).toEqual([]);
  });
});
