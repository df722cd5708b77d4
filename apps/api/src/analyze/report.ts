import fs from 'fs/promises';
import path from 'path';
import type { ComparisonResult, SchemaDescriptor } from '../types/schema';
import { LOW_FILL_PERCENT, sortLowFill } from './compare';

const escapeHtml = (value: string) =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

const pct = (value: number) => `${value.toFixed(1)}%`;

const STYLE = `
  body { font-family: Arial, sans-serif; margin: 20px; }
  h1, h2, h3 { color: #333; }
  table { border-collapse: collapse; width: 100%; margin-bottom: 20px; }
  th, td { padding: 8px; text-align: left; border: 1px solid #ddd; }
  th { background-color: #f2f2f2; }
  .missing { color: red; }
  .extra { color: orange; }
  .low-fill { background-color: #ffe6e6; }
  .summary { background-color: #f9f9f9; padding: 10px; margin-bottom: 20px; }
`;

export type ReportInput = {
  schemas: Record<string, SchemaDescriptor>;
  comparison: ComparisonResult;
  dataSource: string;
};

const renderSummary = ({ schemas, dataSource }: ReportInput) => {
  const descriptors = Object.values(schemas);
  const totalRecords = descriptors.reduce((sum, d) => sum + d.recordCount, 0);
  const rows = descriptors
    .map(
      d =>
        `<tr><td>${escapeHtml(d.elementType)}</td><td>${d.recordCount}</td><td>${d.columns.length}</td></tr>`
    )
    .join('\n');

  return `<div class="summary">
<h2>Summary</h2>
<p>Analyzed ${descriptors.length} element types from ${escapeHtml(dataSource)}.</p>
<p>Total records: ${totalRecords}</p>
<table>
<tr><th>Element Type</th><th>Record Count</th><th>Parameter Count</th></tr>
${rows}
</table>
</div>`;
};

const renderParameters = (d: SchemaDescriptor) => {
  const rows = d.columns
    .map(c => {
      const fillPercent = c.fillRate * 100;
      const rowClass = fillPercent < LOW_FILL_PERCENT ? ' class="low-fill"' : '';
      return `<tr${rowClass}><td>${escapeHtml(c.name)}</td><td>${c.dataType}</td><td>${c.nullCount}</td><td>${pct(
        c.nullPercentage
      )}</td><td>${c.distinctCount}</td><td>${pct(fillPercent)}</td></tr>`;
    })
    .join('\n');

  return `<h2>Element Type: ${escapeHtml(d.elementType)}</h2>
<h3>Parameter Details</h3>
<table>
<tr><th>Parameter</th><th>Data Type</th><th>Null Count</th><th>Null %</th><th>Unique Values</th><th>Fill Rate %</th></tr>
${rows}
</table>`;
};

const list = (items: string[], className: string) =>
  items.length ? items.map(i => `<span class="${className}">${escapeHtml(i)}</span>`).join(', ') : 'None';

const renderComparison = (comparison: ComparisonResult) => {
  const types = Object.entries(comparison.byElementType);
  if (!types.length && !comparison.diagnostics.length) return '';

  const sections = types.map(([elementType, c]) => {
    const lowFill = sortLowFill(c.lowFillRequired)
      .map(([param, rate]) => `<li>${escapeHtml(param)}: ${pct(rate)}</li>`)
      .join('');
    const renames = c.possibleRenames
      .map(r => `<li>${escapeHtml(r.missing)} &rarr; ${escapeHtml(r.extra)} (${r.similarity.toFixed(2)})</li>`)
      .join('');
    return `<h3>${escapeHtml(elementType)}</h3>
<table>
<tr><th>Status</th><th>Count</th><th>Parameters</th></tr>
<tr><td>Missing Parameters</td><td>${c.missingParameters.length}</td><td>${list(c.missingParameters, 'missing')}</td></tr>
<tr><td>Extra Parameters</td><td>${c.extraParameters.length}</td><td>${list(c.extraParameters, 'extra')}</td></tr>
</table>${lowFill ? `\n<p>Required parameters with low fill rate:</p>\n<ul>${lowFill}</ul>` : ''}${
      renames ? `\n<p>Possible renames:</p>\n<ul>${renames}</ul>` : ''
    }`;
  });

  const diagnostics = comparison.diagnostics.length
    ? `\n<h3>Skipped element types</h3>\n<ul>${comparison.diagnostics
        .map(d => `<li>${escapeHtml(d.elementType)}: ${escapeHtml(d.message)}</li>`)
        .join('')}</ul>`
    : '';

  return `<h2>Schema Comparison</h2>\n${sections.join('\n')}${diagnostics}`;
};

export const renderReport = (input: ReportInput) => `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>BIM Data Analysis Report</title>
<style>${STYLE}</style>
</head>
<body>
<h1>BIM Data Analysis Report</h1>
${renderSummary(input)}
${Object.values(input.schemas).map(renderParameters).join('\n')}
${renderComparison(input.comparison)}
</body>
</html>
`;

export const writeReport = async (filePath: string, input: ReportInput) => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, renderReport(input), 'utf-8');
  return filePath;
};
