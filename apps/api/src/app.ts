import express, { type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import fs from 'fs/promises';
import path from 'path';

import { isElementCategory } from './answer/router';
import { analyzeExports, convertExports } from './commands';
import type { AppContext } from './context';
import { ErrorCode, isBimInsightError, errorMessage, ValidationError } from './errors';
import { parseElementTable } from './ingest/tabular';
import { toAnalysisFile } from './store';
import { createLogger } from './utils/logger';

const log = createLogger('api');

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.INPUT_NOT_FOUND]: 404,
  [ErrorCode.SCHEMA_FORMAT]: 422,
  [ErrorCode.VALIDATION]: 400,
  [ErrorCode.COLLECTION_NOT_FOUND]: 409,
  [ErrorCode.COLLECTION_EXISTS]: 409,
  [ErrorCode.INGESTION_FAILED]: 500,
  [ErrorCode.GENERATION_FAILED]: 502
};

const sendError = (res: Response, err: unknown, fallback: string) => {
  if (isBimInsightError(err)) {
    res.status(STATUS_BY_CODE[err.code]).json({ error: err.message, code: err.code });
    return;
  }
  log.error(fallback, { error: errorMessage(err) });
  res.status(500).json({ error: errorMessage(err) || fallback });
};

const optionalString = (value: unknown) => (typeof value === 'string' && value.trim() ? value.trim() : undefined);

/** Request-supplied file names stay inside the data folder: no absolute paths, no `..` segments. */
export const resolveInDataDir = (dataDir: string, name: string | undefined, field: string) => {
  if (name === undefined) return undefined;
  const segments = name.split(/[\\/]+/);
  if (path.isAbsolute(name) || path.win32.isAbsolute(name) || segments.includes('..')) {
    throw new ValidationError(`${field} must be a file name inside the data folder`, { operation: 'analyze', field });
  }
  return path.join(dataDir, name);
};

export const createApp = (ctx: AppContext) => {
  const app = express();
  const upload = multer();

  app.use(cors());
  app.use(express.json({ limit: '2mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true, generator: ctx.router.hasGenerator, analysisLoaded: ctx.router.getAnalysis() !== null });
  });

  app.get('/api/analysis', (_req, res) => {
    const analysis = ctx.router.getAnalysis();
    if (!analysis) return res.status(404).json({ error: 'No analysis results available. Run the analysis first.' });
    res.json(toAnalysisFile(analysis));
  });

  app.post('/api/analyze', async (req, res) => {
    try {
      const body = req.body || {};
      const { dataDir } = ctx.config;
      const result = await analyzeExports(ctx, {
        expectedSchemaPath: resolveInDataDir(dataDir, optionalString(body.schemaPath), 'schemaPath'),
        synthesize: body.synthesize === true,
        saveSchemaPath: resolveInDataDir(dataDir, optionalString(body.saveSchemaPath), 'saveSchemaPath'),
        reportPath: resolveInDataDir(dataDir, optionalString(body.outputPath), 'outputPath')
      });
      res.json(toAnalysisFile(result));
    } catch (err) {
      sendError(res, err, 'Analysis failed');
    }
  });

  app.post('/api/convert', upload.array('files'), async (req, res) => {
    try {
      const files = Array.isArray(req.files) ? req.files : [];
      const onExists = req.body?.onExists;
      if (onExists !== undefined && onExists !== 'reuse' && onExists !== 'replace') {
        return res.status(400).json({ error: "onExists must be 'reuse' or 'replace'" });
      }

      const tables = files.length ? files.map(file => parseElementTable(file.buffer, file.originalname)) : undefined;
      const report = await convertExports(ctx, { tables, onExists });
      res.json(report);
    } catch (err) {
      sendError(res, err, 'Conversion failed');
    }
  });

  app.post('/api/query', async (req, res) => {
    try {
      const query = optionalString(req.body?.query);
      if (!query) return res.status(400).json({ error: 'query is required' });
      const k = req.body?.k === undefined ? undefined : Number(req.body.k);

      const answer = await ctx.router.answer(query, k);
      res.json(answer);
    } catch (err) {
      sendError(res, err, 'Query failed');
    }
  });

  app.get('/api/parameters/:category', (req, res) => {
    const category = req.params.category.toLowerCase();
    if (!isElementCategory(category)) {
      return res.status(400).json({ error: `Unknown element category '${req.params.category}'` });
    }
    const summary = ctx.router.missingParameterSummary(category);
    if (!summary) return res.status(404).json({ error: 'No analysis results available. Run the analysis first.' });
    res.json({ category, elementTypes: summary });
  });

  app.get('/api/summary', (_req, res) => {
    const summary = ctx.router.analysisSummary();
    if (!summary) return res.status(404).json({ error: 'No analysis results available. Run the analysis first.' });
    res.json(summary);
  });

  app.get('/api/report', async (_req, res) => {
    try {
      const analysis = ctx.router.getAnalysis();
      if (!analysis?.reportPath) return res.status(404).json({ error: 'No report available. Run the analysis first.' });
      const html = await fs.readFile(path.resolve(analysis.reportPath), 'utf-8');
      res.type('html').send(html);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return res.status(404).json({ error: 'Report file not found. Re-run the analysis.' });
      }
      sendError(res, err, 'Failed to read report');
    }
  });

  return app;
};
