import fs from 'fs/promises';
import { z } from 'zod';
import { InputNotFoundError, SchemaFormatError } from '../errors';
import type { ExpectedElementSchema, ExpectedSchema, SchemaDescriptor } from '../types/schema';

export const REQUIRED_FILL_THRESHOLD = 0.8;

const entrySchema = z.object({
  parameters: z.array(z.string()),
  required_parameters: z.array(z.string()).optional().default([]),
  description: z.string().optional().default('')
});

const documentSchema = z.record(z.string(), z.unknown());

/** Raw expected-schema document: entries are validated one element type at a time. */
export type ExpectedSchemaDocument = Record<string, unknown>;

export type ExpectedSchemaFile = Record<
  string,
  { parameters: string[]; required_parameters: string[]; description: string }
>;

export const parseExpectedSchemaDocument = (json: unknown): ExpectedSchemaDocument => {
  const parsed = documentSchema.safeParse(json);
  if (!parsed.success || Array.isArray(json)) {
    throw new SchemaFormatError('Expected schema must be a JSON object keyed by element type');
  }
  return parsed.data;
};

export const parseExpectedEntry = (elementType: string, raw: unknown): ExpectedElementSchema => {
  const parsed = entrySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length ? issue.path.join('.') : 'entry';
    throw new SchemaFormatError(`Malformed expected schema for '${elementType}': ${where} ${issue.message}`, {
      elementType
    });
  }
  return {
    parameters: parsed.data.parameters,
    requiredParameters: parsed.data.required_parameters,
    description: parsed.data.description
  };
};

export const loadExpectedSchema = async (filePath: string): Promise<ExpectedSchemaDocument> => {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new InputNotFoundError(filePath, 'Expected schema file');
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new SchemaFormatError(`Expected schema file ${filePath} is not valid JSON`, { path: filePath });
  }
  return parseExpectedSchemaDocument(json);
};

/**
 * Expected schema derived from the observed data: every column is an expected parameter and
 * columns filled in more than 80% of records are required.
 */
export const synthesizeExpectedSchema = (actual: Record<string, SchemaDescriptor>): ExpectedSchema => {
  const expected: ExpectedSchema = {};
  for (const [elementType, descriptor] of Object.entries(actual)) {
    expected[elementType] = {
      parameters: descriptor.columns.map(c => c.name),
      requiredParameters: descriptor.columns.filter(c => c.fillRate > REQUIRED_FILL_THRESHOLD).map(c => c.name),
      description: `Expected schema for ${elementType} elements`
    };
  }
  return expected;
};

export const toExpectedSchemaFile = (schema: ExpectedSchema): ExpectedSchemaFile => {
  const file: ExpectedSchemaFile = {};
  for (const [elementType, entry] of Object.entries(schema)) {
    file[elementType] = {
      parameters: entry.parameters,
      required_parameters: entry.requiredParameters,
      description: entry.description
    };
  }
  return file;
};

export const saveExpectedSchema = async (filePath: string, schema: ExpectedSchema) => {
  await fs.writeFile(filePath, `${JSON.stringify(toExpectedSchemaFile(schema), null, 2)}\n`, 'utf-8');
};
