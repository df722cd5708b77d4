import { describe, it, expect } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import * as XLSX from 'xlsx';
import { InputNotFoundError, ValidationError } from '../errors';
import {
  discoverExportFiles,
  elementTypeFromFileName,
  isExportFileName,
  parseElementTable,
  readElementTable,
  toCellValue,
  uniqueHeaders
} from '../ingest/tabular';

const makeWorkbookBuffer = () => {
  const data = [
    ['GlobalId', 'Height'],
    ['A1', 3.2],
    ['A2', null]
  ];
  const sheet = XLSX.utils.aoa_to_sheet(data);
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, sheet, 'Sheet1');
  return XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
};

describe('elementTypeFromFileName', () => {
  it('takes the second underscore token, lowercased', () => {
    expect(elementTypeFromFileName('ifc_wall_export.xlsx')).toBe('wall');
    expect(elementTypeFromFileName('Project_Windows_2024.csv')).toBe('windows');
    expect(elementTypeFromFileName('/data/ifc_door.csv')).toBe('door');
  });

  it('rejects names without a type token', () => {
    expect(() => elementTypeFromFileName('walls.csv')).toThrow(ValidationError);
  });

  it('recognizes export file names', () => {
    expect(isExportFileName('ifc_wall.csv')).toBe(true);
    expect(isExportFileName('ifc_slab_export.xlsx')).toBe(true);
    expect(isExportFileName('notes.txt')).toBe(false);
    expect(isExportFileName('walls.csv')).toBe(false);
  });
});

describe('uniqueHeaders', () => {
  it('numbers repeats and skips taken suffixes', () => {
    expect(uniqueHeaders(['Width', 'Width', 'Width_1', 'Width', ' ', null])).toEqual([
      'Width',
      'Width_1',
      'Width_1_1',
      'Width_2',
      null,
      null
    ]);
  });
});

describe('toCellValue', () => {
  it('normalizes blanks and NaN to empty', () => {
    expect(toCellValue('  ')).toEqual({ kind: 'empty' });
    expect(toCellValue(Number.NaN)).toEqual({ kind: 'empty' });
    expect(toCellValue(null)).toEqual({ kind: 'empty' });
  });

  it('keeps numbers and trims text', () => {
    expect(toCellValue(4)).toEqual({ kind: 'number', value: 4 });
    expect(toCellValue(' Basic Wall ')).toEqual({ kind: 'text', value: 'Basic Wall' });
    expect(toCellValue(false)).toEqual({ kind: 'boolean', value: false });
  });
});

describe('parseElementTable', () => {
  it('parses a CSV export', () => {
    const csv = 'GlobalId,Name,FireRating\nA1,Wall 1,REI60\nA2,Wall 2,\n';
    const table = parseElementTable(Buffer.from(csv), 'ifc_wall_export.csv');
    expect(table.elementType).toBe('wall');
    expect(table.source).toBe('csv');
    expect(table.columns).toEqual(['GlobalId', 'Name', 'FireRating']);
    expect(table.records).toHaveLength(2);
    expect(table.records[0].fields.FireRating).toEqual({ kind: 'text', value: 'REI60' });
    expect(table.records[1].fields.FireRating).toEqual({ kind: 'empty' });
    expect(table.records[1].elementType).toBe('wall');
  });

  it('parses an XLSX export', () => {
    const table = parseElementTable(Buffer.from(makeWorkbookBuffer()), 'ifc_slab_export.xlsx');
    expect(table.elementType).toBe('slab');
    expect(table.source).toBe('excel');
    expect(table.columns).toEqual(['GlobalId', 'Height']);
    expect(table.records[0].fields.Height).toEqual({ kind: 'number', value: 3.2 });
    expect(table.records[1].fields.Height).toEqual({ kind: 'empty' });
  });

  it('keeps every column of an XLSX export with repeated headers', () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ['Name', 'Width', 'Width'],
      ['W1', 100, 200]
    ]);
    const wb = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(wb, sheet, 'Sheet1');
    const buffer = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });

    const table = parseElementTable(Buffer.from(buffer), 'ifc_wall_export.xlsx');
    expect(table.columns).toEqual(['Name', 'Width', 'Width_1']);
    expect(table.records[0].fields.Width).toEqual({ kind: 'number', value: 100 });
    expect(table.records[0].fields.Width_1).toEqual({ kind: 'number', value: 200 });
  });

  it('keeps every column of a CSV export with repeated headers', () => {
    const table = parseElementTable(Buffer.from('Name,Width,Width\nW1,100,200\n'), 'ifc_wall_export.csv');
    expect(table.columns).toEqual(['Name', 'Width', 'Width_1']);
    expect(table.records[0].fields.Width_1).toEqual({ kind: 'text', value: '200' });
  });

  it('drops columns without a header', () => {
    const table = parseElementTable(Buffer.from('Name,,Width\nW1,x,100\n'), 'ifc_wall_export.csv');
    expect(table.columns).toEqual(['Name', 'Width']);
    expect(table.records[0].fields.Width).toEqual({ kind: 'text', value: '100' });
  });

  it('freezes parsed records', () => {
    const table = parseElementTable(Buffer.from('GlobalId\nA1\n'), 'ifc_door.csv');
    expect(Object.isFrozen(table.records[0])).toBe(true);
    expect(Object.isFrozen(table.records[0].fields)).toBe(true);
  });
});

describe('export discovery', () => {
  it('lists export files in name order and ignores other files', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bim-ingest-'));
    await fs.writeFile(path.join(dir, 'b_wall_x.csv'), 'GlobalId\nA1\n');
    await fs.writeFile(path.join(dir, 'a_door_x.csv'), 'GlobalId\nD1\n');
    await fs.writeFile(path.join(dir, 'notes.txt'), 'hello');

    expect(await discoverExportFiles(dir)).toEqual([path.join(dir, 'a_door_x.csv'), path.join(dir, 'b_wall_x.csv')]);
  });

  it('reports a missing data folder', async () => {
    await expect(discoverExportFiles(path.join(os.tmpdir(), 'bim-does-not-exist'))).rejects.toBeInstanceOf(
      InputNotFoundError
    );
  });

  it('reports a missing export file', async () => {
    await expect(readElementTable(path.join(os.tmpdir(), 'bim_wall_missing.csv'))).rejects.toBeInstanceOf(
      InputNotFoundError
    );
  });
});
