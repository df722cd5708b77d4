import { describe, it, expect, beforeEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { readAnalysisResult, writeAnalysisResult } from '../store';
import type { AnalysisResult } from '../types/schema';

const result: AnalysisResult = {
  schemas: {
    wall: {
      elementType: 'wall',
      recordCount: 3,
      columns: [
        { name: 'Name', dataType: 'string', nullCount: 0, nullPercentage: 0, distinctCount: 3, fillRate: 1 },
        { name: 'FireRating', dataType: 'string', nullCount: 2, nullPercentage: 50, distinctCount: 1, fillRate: 0.5 }
      ]
    }
  },
  comparison: {
    byElementType: {
      wall: {
        missingParameters: ['LoadBearing'],
        extraParameters: ['Comments'],
        lowFillRequired: [['FireRating', 50]],
        possibleRenames: [{ missing: 'LoadBearing', extra: 'Load_Bearing', similarity: 1 }]
      }
    },
    diagnostics: [{ elementType: 'door', reason: 'not_in_data', message: 'Element type door not found in actual data' }]
  },
  reportPath: 'bim_analysis_report.html',
  generatedAt: '2024-05-01T10:00:00.000Z'
};

describe('analysis result store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bim-store-'));
  });

  it('reads back what it wrote', async () => {
    const file = path.join(dir, 'analysis_results.json');
    await writeAnalysisResult(file, result);
    expect(await readAnalysisResult(file)).toEqual(result);
  });

  it('writes the snake_case file layout', async () => {
    const file = path.join(dir, 'analysis_results.json');
    await writeAnalysisResult(file, result);
    const json = JSON.parse(await fs.readFile(file, 'utf-8'));

    expect(json.report_path).toBe('bim_analysis_report.html');
    expect(json.schemas.wall.record_count).toBe(3);
    expect(json.schemas.wall.fill_rates).toEqual({ Name: 1, FireRating: 0.5 });
    expect(json.comparison.missing_parameters).toEqual({ wall: ['LoadBearing'] });
    expect(json.comparison.low_fill_required).toEqual({ wall: [['FireRating', 50]] });
  });

  it('leaves no temporary file behind', async () => {
    const file = path.join(dir, 'nested', 'analysis_results.json');
    await writeAnalysisResult(file, result);
    expect(await fs.readdir(path.dirname(file))).toEqual(['analysis_results.json']);
  });

  it('treats a missing file as no previous result', async () => {
    expect(await readAnalysisResult(path.join(dir, 'absent.json'))).toBeNull();
  });

  it('ignores unreadable or invalid files', async () => {
    const broken = path.join(dir, 'broken.json');
    await fs.writeFile(broken, '{ not json');
    expect(await readAnalysisResult(broken)).toBeNull();

    const invalid = path.join(dir, 'invalid.json');
    await fs.writeFile(invalid, JSON.stringify({ schemas: [] }));
    expect(await readAnalysisResult(invalid)).toBeNull();
  });

  it('treats a result path it cannot read as no previous result', async () => {
    const folder = path.join(dir, 'analysis_results.json');
    await fs.mkdir(folder);
    expect(await readAnalysisResult(folder)).toBeNull();
  });

  it('accepts files without a comparison section detail', async () => {
    const file = path.join(dir, 'minimal.json');
    await fs.writeFile(file, JSON.stringify({ schemas: {}, comparison: {}, report_path: 'r.html' }));
    expect(await readAnalysisResult(file)).toEqual({
      schemas: {},
      comparison: { byElementType: {}, diagnostics: [] },
      reportPath: 'r.html',
      generatedAt: ''
    });
  });
});
