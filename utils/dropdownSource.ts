import type { DropdownSource } from '../types';
import { isCellRef } from './cellRefs';

const DEFINED_NAME = /^[A-Za-z_\\][\w.\\]*$/;

const unquoteSheet = (sheet: string) => sheet.replace(/^'(.*)'$/, '$1').replace(/''/g, "'");

/**
 * Classifies a list-validation formula.
 *
 * - `"a,b,c"` is an inline list
 * - `Sheet!$A$1:$A$9`, `'My Sheet'!A1:A9`, `$A$1:$A$9`, `Lists!$A:$A` are ranges
 * - a bare identifier is a workbook-level defined name
 *
 * Returns undefined for anything else (INDIRECT(), OFFSET(), ...).
 */
export const parseDropdownSource = (formula: string): DropdownSource | undefined => {
  const f = formula.trim().replace(/^=/, '');
  if (!f) return undefined;

  if (f.startsWith('"')) {
    const options = f
      .replace(/^"|"$/g, '')
      .split(',')
      .map(option => option.trim())
      .filter(option => option.length > 0);
    return { kind: 'inline', options };
  }

  const bang = f.lastIndexOf('!');
  if (bang !== -1) {
    const range = f.substring(bang + 1);
    if (!isCellRef(range)) return undefined;
    return { kind: 'range', sheet: unquoteSheet(f.substring(0, bang)), range };
  }

  if (isCellRef(f)) return { kind: 'range', range: f };
  if (DEFINED_NAME.test(f)) return { kind: 'named', name: f };
  return undefined;
};
