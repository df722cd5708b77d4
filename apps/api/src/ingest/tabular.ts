import fs from 'fs/promises';
import path from 'path';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { InputNotFoundError, ValidationError } from '../errors';
import type { CellValue, ElementRecord, ElementTable, ElementType } from '../types/schema';

const EXPORT_EXTENSIONS = /\.(csv|xlsx|xls)$/i;

const stripExt = (name: string) => name.replace(EXPORT_EXTENSIONS, '');

/**
 * Element type from the export naming convention `prefix_<type>_...`:
 * `ifc_wall_export.xlsx` is `wall`, `ifc_windows_export.xlsx` is `windows`.
 */
export const elementTypeFromFileName = (fileName: string): ElementType => {
  const tokens = stripExt(path.basename(fileName)).split('_');
  const type = (tokens[1] ?? '').trim().toLowerCase();
  if (!type) {
    throw new ValidationError(`Cannot derive element type from file name '${fileName}' (expected prefix_<type>_...)`, {
      path: fileName
    });
  }
  return type;
};

export const isExportFileName = (fileName: string) => {
  if (!EXPORT_EXTENSIONS.test(fileName)) return false;
  return stripExt(fileName).split('_').filter(Boolean).length >= 2;
};

export const toCellValue = (raw: unknown): CellValue => {
  if (raw === null || raw === undefined) return { kind: 'empty' };
  if (typeof raw === 'number') return Number.isNaN(raw) ? { kind: 'empty' } : { kind: 'number', value: raw };
  if (typeof raw === 'boolean') return { kind: 'boolean', value: raw };
  if (raw instanceof Date) return Number.isNaN(raw.valueOf()) ? { kind: 'empty' } : { kind: 'text', value: raw.toISOString() };
  const text = String(raw).trim();
  return text ? { kind: 'text', value: text } : { kind: 'empty' };
};

export const isEmptyCell = (cell: CellValue | undefined) => !cell || cell.kind === 'empty';

export const cellToString = (cell: CellValue | undefined) => {
  if (!cell || cell.kind === 'empty') return '';
  return String(cell.value);
};

/**
 * Header names made unique the way spreadsheet exports expect: a repeated `Width` becomes
 * `Width_1`, `Width_2`, ... Blank headers get `null` and their cells are dropped.
 */
export const uniqueHeaders = (raw: readonly unknown[]): (string | null)[] => {
  const used = new Set<string>();
  return raw.map(cell => {
    const name = cell === null || cell === undefined ? '' : String(cell);
    if (!name.trim()) return null;
    let unique = name;
    for (let n = 1; used.has(unique); n++) unique = `${name}_${n}`;
    used.add(unique);
    return unique;
  });
};

const isBlankRow = (row: readonly unknown[]) => row.every(cell => cell === null || cell === undefined || cell === '');

const readGrid = (buffer: Buffer, fileName: string): { grid: unknown[][]; source: ElementTable['source'] } => {
  const lower = fileName.toLowerCase();
  if (lower.endsWith('.xlsx') || lower.endsWith('.xls')) {
    const workbook = XLSX.read(buffer, { type: 'buffer' });
    const sheetName = workbook.SheetNames[0];
    const worksheet = sheetName ? workbook.Sheets[sheetName] : undefined;
    if (!worksheet) return { grid: [], source: 'excel' };
    const grid = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, defval: '', blankrows: false });
    return { grid, source: 'excel' };
  }

  const parsed = Papa.parse<unknown[]>(buffer.toString('utf-8'), {
    header: false,
    skipEmptyLines: true,
    dynamicTyping: false
  });

  if (parsed.errors?.length) {
    throw new ValidationError(`CSV parse error in ${fileName}: ${parsed.errors[0].message}`, { path: fileName });
  }
  return { grid: parsed.data || [], source: 'csv' };
};

const parseRows = (buffer: Buffer, fileName: string) => {
  const { grid, source } = readGrid(buffer, fileName);
  const [header = [], ...body] = grid;
  const headers = uniqueHeaders(header);
  const columns = headers.filter((h): h is string => h !== null);

  const rows = body
    .filter(row => !isBlankRow(row))
    .map(row => {
      const values: Record<string, unknown> = {};
      headers.forEach((name, i) => {
        if (name !== null) values[name] = row[i];
      });
      return values;
    });
  return { columns, rows, source };
};

export const parseElementTable = (buffer: Buffer, fileName: string): ElementTable => {
  const elementType = elementTypeFromFileName(fileName);
  const { columns, rows, source } = parseRows(buffer, fileName);

  const records: ElementRecord[] = rows.map(row => {
    const fields: Record<string, CellValue> = {};
    for (const column of columns) fields[column] = toCellValue(row[column]);
    return Object.freeze({ elementType, fields: Object.freeze(fields) });
  });

  return { elementType, sourcePath: fileName, source, columns, records };
};

export const readElementTable = async (filePath: string): Promise<ElementTable> => {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new InputNotFoundError(filePath, 'Export file');
    }
    throw err;
  }
  const table = parseElementTable(buffer, path.basename(filePath));
  return { ...table, sourcePath: filePath };
};

export const discoverExportFiles = async (dataDir: string): Promise<string[]> => {
  let entries: string[];
  try {
    entries = await fs.readdir(dataDir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new InputNotFoundError(dataDir, 'Data folder');
    }
    throw err;
  }
  return entries
    .filter(isExportFileName)
    .sort()
    .map(name => path.join(dataDir, name));
};
