import type { CellValue, ColumnStats, DataType, ElementRecord, ElementTable, SchemaDescriptor } from '../types/schema';

const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
// IFC GlobalIds are 22-character base64 strings.
const IFC_GUID_REGEX = /^[0-9A-Za-z_$]{22}$/;

const isBoolean = (v: string) => /^(true|false|yes|no)$/i.test(v);
const isCurrency = (v: string) => /^[\$€£]\s?\d+(,\d{3})*(\.\d+)?$/.test(v);
const isDateLike = (v: string) => {
  if (!v || !/\d/.test(v)) return false;
  const d = new Date(v);
  return !Number.isNaN(d.valueOf());
};

const distinctKey = (cell: CellValue) => (cell.kind === 'empty' ? '' : `${cell.kind}:${String(cell.value)}`);

export const inferDataType = (cells: CellValue[]): DataType => {
  const present = cells.filter(c => c.kind !== 'empty');
  if (!present.length) return 'unknown';

  let numberCount = 0;
  let booleanCount = 0;
  let dateCount = 0;
  let uuidCount = 0;
  let currencyCount = 0;

  for (const cell of present) {
    if (cell.kind === 'number') {
      numberCount++;
      continue;
    }
    if (cell.kind === 'boolean') {
      booleanCount++;
      continue;
    }
    if (cell.kind !== 'text') continue;
    const v = cell.value;
    if (UUID_REGEX.test(v) || IFC_GUID_REGEX.test(v)) uuidCount++;
    if (isCurrency(v)) currencyCount++;
    if (isBoolean(v)) booleanCount++;
    if (!Number.isNaN(Number(v))) numberCount++;
    else if (isDateLike(v)) dateCount++;
  }

  const ratio = (n: number) => n / present.length;

  if (ratio(uuidCount) >= 0.8) return 'uuid';
  if (ratio(currencyCount) >= 0.8) return 'currency';
  if (ratio(numberCount) >= 0.8) return 'number';
  if (ratio(booleanCount) >= 0.8) return 'boolean';
  if (ratio(dateCount) >= 0.8) return 'date';
  return 'string';
};

export const profileColumn = (name: string, cells: CellValue[]): ColumnStats => {
  const recordCount = cells.length;
  const nullCount = cells.filter(c => c.kind === 'empty').length;
  const distinct = new Set(cells.filter(c => c.kind !== 'empty').map(distinctKey));

  return {
    name,
    dataType: inferDataType(cells),
    nullCount,
    nullPercentage: recordCount ? (nullCount / recordCount) * 100 : 0,
    distinctCount: distinct.size,
    fillRate: recordCount ? 1 - nullCount / recordCount : 0
  };
};

const collectColumns = (records: readonly ElementRecord[]) => {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record.fields)) seen.add(key);
  }
  return Array.from(seen);
};

/**
 * Statistics for one element type. `columns` fixes the reported order; when omitted the
 * union of the records' field names is used in first-seen order. A record without a
 * column counts as a null for it.
 */
export const profileRecords = (
  records: readonly ElementRecord[],
  columns: readonly string[] = collectColumns(records),
  elementType = records[0]?.elementType ?? ''
): SchemaDescriptor => {
  const empty: CellValue = { kind: 'empty' };
  return {
    elementType,
    recordCount: records.length,
    columns: columns.map(col => profileColumn(col, records.map(r => r.fields[col] ?? empty)))
  };
};

export const profileTable = (table: ElementTable): SchemaDescriptor =>
  profileRecords(table.records, table.columns, table.elementType);

export const fillRateTable = (descriptor: SchemaDescriptor) =>
  new Map(descriptor.columns.map(c => [c.name, c.fillRate]));
