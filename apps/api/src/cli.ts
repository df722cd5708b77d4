import dotenv from 'dotenv';
import path from 'path';
import { createInterface, type Interface } from 'readline/promises';
import { fileURLToPath } from 'url';

import { isElementCategory } from './answer/router';
import { flag, parseCliArgs, stringOption, USAGE, type CliArgs } from './cliArgs';
import { analyzeExports, convertExports } from './commands';
import { loadConfig } from './config';
import { createContext, type AppContext } from './context';
import { errorMessage, isBimInsightError, ValidationError } from './errors';
import type { OnExists } from './retrieve/documents';
import { formatSources, parseSessionCommand, type SessionCommand } from './session';
import type { AnalysisResult } from './types/schema';
import { createLogger } from './utils/logger';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.join(__dirname, '../../../.env') });
dotenv.config();

const log = createLogger('cli');

const askOnExists = async (rl: Interface, collection: string): Promise<OnExists | undefined> => {
  const reply = (await rl.question(`Collection '${collection}' already exists. [r]euse, re[p]lace or [c]ancel? `))
    .trim()
    .toLowerCase();
  if (reply === 'r' || reply === 'reuse') return 'reuse';
  if (reply === 'p' || reply === 'replace') return 'replace';
  return undefined;
};

const runConvert = async (ctx: AppContext, args: CliArgs) => {
  if (flag(args, 'replace') && flag(args, 'reuse')) {
    throw new ValidationError('Pass only one of --replace and --reuse', { operation: 'convert' });
  }
  let onExists: OnExists | undefined = flag(args, 'replace') ? 'replace' : flag(args, 'reuse') ? 'reuse' : undefined;

  if (!onExists && process.stdin.isTTY && (await ctx.store.hasCollection(ctx.config.collectionName))) {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      onExists = await askOnExists(rl, ctx.config.collectionName);
    } finally {
      rl.close();
    }
    if (!onExists) {
      console.log('Cancelled.');
      return;
    }
  }

  const report = await convertExports(ctx, { dataDir: stringOption(args, 'data-folder'), onExists });
  console.log(
    `Collection '${report.collection}' ${report.action}: ${report.documentCount} documents in ${report.batches} batch(es).`
  );
};

const printAnalysis = (result: AnalysisResult) => {
  const types = Object.keys(result.schemas);
  console.log(`Analyzed ${types.length} element type(s): ${types.join(', ') || 'none'}`);
  for (const diagnostic of result.comparison.diagnostics) {
    console.log(`  skipped ${diagnostic.elementType}: ${diagnostic.message}`);
  }
  console.log(`Report written to ${result.reportPath}`);
};

const runAnalyze = async (ctx: AppContext, args: CliArgs) => {
  const result = await analyzeExports(ctx, {
    dataDir: stringOption(args, 'data-folder'),
    expectedSchemaPath: stringOption(args, 'schema'),
    synthesize: flag(args, 'synthesize'),
    saveSchemaPath: stringOption(args, 'save-schema'),
    reportPath: stringOption(args, 'output')
  });
  printAnalysis(result);
};

const askYes = async (rl: Interface, question: string) =>
  ['y', 'yes'].includes((await rl.question(question)).trim().toLowerCase());

/** Prints an answer; sources follow always in single-shot mode and on request in a session. */
const printAnswer = async (ctx: AppContext, question: string, rl?: Interface) => {
  const answer = await ctx.router.answer(question);
  console.log(`\n${answer.response}\n`);
  if (!answer.sources.length) return;
  if (rl && !(await askYes(rl, 'Show sources? (y/n): '))) return;
  console.log(`Sources:\n\n${formatSources(answer.sources)}\n`);
};

const runSessionCommand = async (ctx: AppContext, rl: Interface, command: SessionCommand) => {
  switch (command.kind) {
    case 'analyze':
      return printAnalysis(await analyzeExports(ctx));
    case 'compare':
      if (!command.schemaPath) {
        console.log('Please specify a schema file path, e.g. compare expected_schema.json');
        return;
      }
      return printAnalysis(await analyzeExports(ctx, { expectedSchemaPath: command.schemaPath }));
    case 'parameters':
      console.log(ctx.router.describeMissingParameters(command.category));
      return;
    case 'summary':
      return runSummary(ctx);
    case 'question':
      return printAnswer(ctx, command.text, rl);
  }
};

const runQuery = async (ctx: AppContext, args: CliArgs) => {
  const question = args.positionals.join(' ').trim();
  if (question) return printAnswer(ctx, question);

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    console.log(
      "Ask about the building model. Commands: analyze, compare <schema>, <type> parameters, summary, exit."
    );
    for (;;) {
      const command = parseSessionCommand(await rl.question('> '));
      if (command.kind === 'exit') break;
      if (command.kind === 'empty') continue;
      try {
        await runSessionCommand(ctx, rl, command);
      } catch (err) {
        // One failed command must not end the session.
        console.error(`Error: ${errorMessage(err)}`);
      }
    }
  } finally {
    rl.close();
  }
};

const runParameters = (ctx: AppContext, args: CliArgs) => {
  const category = (args.positionals[0] ?? '').toLowerCase();
  if (!isElementCategory(category)) {
    throw new ValidationError(`Expected one of wall, door, window, slab; got '${args.positionals[0] ?? ''}'`, {
      operation: 'parameters'
    });
  }
  console.log(ctx.router.describeMissingParameters(category));
};

const runSummary = (ctx: AppContext) => {
  const summary = ctx.router.analysisSummary();
  if (!summary) {
    console.log("No analysis results available. Please run the analysis first using the 'analyze' command.");
    return;
  }
  console.log(`Element types analyzed: ${summary.elementTypes}`);
  console.log(`Missing parameters in total: ${summary.totalMissing}`);
  for (const entry of summary.byElementType) {
    console.log(`  ${entry.elementType}: ${entry.missingParameters.join(', ') || 'none missing'}`);
  }
};

const main = async () => {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.command === 'help' || flag(args, 'help')) {
    console.log(USAGE);
    return;
  }

  const ctx = await createContext(loadConfig());
  switch (args.command) {
    case 'convert':
      return runConvert(ctx, args);
    case 'analyze':
      return runAnalyze(ctx, args);
    case 'query':
      return runQuery(ctx, args);
    case 'parameters':
      return runParameters(ctx, args);
    case 'summary':
      return runSummary(ctx);
  }
};

main().catch(err => {
  if (isBimInsightError(err)) {
    console.error(`Error: ${err.message}`);
  } else {
    log.error('Unexpected failure', { error: errorMessage(err) });
  }
  process.exitCode = 1;
});
