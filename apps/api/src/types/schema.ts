export type DataType = 'string' | 'number' | 'boolean' | 'date' | 'uuid' | 'currency' | 'unknown';

export type ElementType = string;

export type CellValue =
  | { kind: 'text'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'empty' };

export type ElementRecord = {
  readonly elementType: ElementType;
  readonly fields: Readonly<Record<string, CellValue>>;
};

export type ElementTable = {
  elementType: ElementType;
  sourcePath: string;
  source: 'csv' | 'excel';
  columns: string[]; // source column order
  records: ElementRecord[];
};

export type ColumnStats = {
  name: string;
  dataType: DataType;
  nullCount: number;
  nullPercentage: number; // 0..100
  distinctCount: number;
  fillRate: number; // 0..1
};

export type SchemaDescriptor = {
  elementType: ElementType;
  recordCount: number;
  columns: ColumnStats[];
};

export type ExpectedElementSchema = {
  parameters: string[];
  requiredParameters: string[];
  description: string;
};

export type ExpectedSchema = Record<ElementType, ExpectedElementSchema>;

export type LowFillEntry = [parameter: string, fillRatePercent: number];

export type RenameCandidate = {
  missing: string;
  extra: string;
  similarity: number; // 0..1
};

export type ElementComparison = {
  missingParameters: string[];
  extraParameters: string[];
  lowFillRequired: LowFillEntry[];
  possibleRenames: RenameCandidate[];
};

export type ComparisonDiagnostic = {
  elementType: ElementType;
  reason: 'not_in_data' | 'malformed_schema';
  message: string;
};

export type ComparisonResult = {
  byElementType: Record<ElementType, ElementComparison>;
  diagnostics: ComparisonDiagnostic[];
};

export type AnalysisResult = {
  schemas: Record<ElementType, SchemaDescriptor>;
  comparison: ComparisonResult;
  reportPath: string;
  generatedAt: string;
};

export type MetadataValue = string | number | boolean;

export type Document = {
  id: string;
  content: string;
  metadata: Record<string, MetadataValue>;
};

export type RetrievedHit = {
  id: string;
  content: string;
  metadata: Record<string, MetadataValue>;
  distance: number;
  score: number; // 0..1
};
