import JSZip from 'jszip';
import type { Range } from 'xlsx';
import type { DropdownSource } from '../types';
import { decodeRef } from '../utils/cellRefs';
import { parseDropdownSource } from '../utils/dropdownSource';

export interface DropdownRule {
  bounds: Range; // 0-based
  source: DropdownSource;
}

// lower-cased sheet name -> list validations ExcelJS does not load
export type WorkbookDropdowns = Map<string, DropdownRule[]>;

const X14_VALIDATION = /<x14:dataValidation\b([^>]*)>([\s\S]*?)<\/x14:dataValidation>/g;

const attr = (attrs: string, name: string) => attrs.match(new RegExp(`\\b${name}="([^"]*)"`))?.[1];

const element = (xml: string, tag: string) => xml.match(new RegExp(`<${tag}>([\\s\\S]*?)</${tag}>`))?.[1];

const unescapeXml = (text: string) =>
  text
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');

/**
 * List validations of a worksheet part stored in the Excel 2010 extension
 * block (`<x14:dataValidation>`). Excel writes cross-sheet lists there.
 */
export const parseExtDropdowns = (sheetXml: string): DropdownRule[] => {
  const rules: DropdownRule[] = [];
  for (const [, attrs, body] of sheetXml.matchAll(X14_VALIDATION)) {
    if (attr(attrs, 'type') !== 'list') continue;

    const formula = unescapeXml(element(element(body, 'x14:formula1') ?? '', 'xm:f') ?? '');
    const source: DropdownSource = parseDropdownSource(formula) ?? { kind: 'unsupported', formula };
    const sqref = element(body, 'xm:sqref') ?? '';
    sqref
      .trim()
      .split(/\s+/)
      .forEach(ref => {
        const bounds = decodeRef(ref);
        if (bounds) rules.push({ bounds, source });
      });
  }
  return rules;
};

const partPath = (target: string) => (target.startsWith('/') ? target.substring(1) : `xl/${target}`);

export const readExtDropdowns = async (data: ArrayBuffer | Uint8Array): Promise<WorkbookDropdowns> => {
  const dropdowns: WorkbookDropdowns = new Map();
  const zip = await JSZip.loadAsync(data);
  const workbookXml = await zip.file('xl/workbook.xml')?.async('string');
  const relsXml = await zip.file('xl/_rels/workbook.xml.rels')?.async('string');
  if (!workbookXml || !relsXml) return dropdowns;

  const targets = new Map<string, string>();
  for (const [, attrs] of relsXml.matchAll(/<Relationship\b([^>]*)>/g)) {
    const id = attr(attrs, 'Id');
    const target = attr(attrs, 'Target');
    if (id && target) targets.set(id, partPath(target));
  }

  for (const [, attrs] of workbookXml.matchAll(/<sheet\b([^>]*)>/g)) {
    const name = attr(attrs, 'name');
    const relId = attr(attrs, 'r:id');
    const path = relId ? targets.get(relId) : undefined;
    if (!name || !path) continue;

    const sheetXml = await zip.file(path)?.async('string');
    if (!sheetXml) continue;
    const rules = parseExtDropdowns(sheetXml);
    if (rules.length > 0) dropdowns.set(unescapeXml(name).trim().toLowerCase(), rules);
  }
  return dropdowns;
};
