import { errorMessage } from '../errors';
import type { RetrievalEngine } from '../retrieve/engine';
import type { AnalysisResult, RetrievedHit } from '../types/schema';
import { createLogger } from '../utils/logger';
import { formatContext, type AnswerGenerator } from './generator';

const log = createLogger('router');

export const ELEMENT_CATEGORIES = ['wall', 'door', 'window', 'slab'] as const;
export type ElementCategory = (typeof ELEMENT_CATEGORIES)[number];

export const isElementCategory = (value: string): value is ElementCategory =>
  ELEMENT_CATEGORIES.some(c => c === value);

export type QueryRoute = { kind: 'structured'; category: ElementCategory } | { kind: 'generic' };

export type RouterState = 'idle' | 'classifying' | 'structured_lookup' | 'generic_retrieval' | 'responding';

export type Answer = {
  query: string;
  response: string;
  sources: RetrievedHit[];
  route: QueryRoute['kind'];
  generated: boolean;
};

export const NO_ANALYSIS_RESPONSE =
  "No analysis results available. Please run the analysis first using the 'analyze' command.";

/**
 * A query is a structured lookup when it asks about missing parameters of a known element
 * category. When several categories appear, the first in ELEMENT_CATEGORIES order wins.
 */
export const classifyQuery = (text: string): QueryRoute => {
  const q = text.toLowerCase();
  if (!q.includes('missing') || !q.includes('parameters')) return { kind: 'generic' };
  const category = ELEMENT_CATEGORIES.find(c => q.includes(c));
  return category ? { kind: 'structured', category } : { kind: 'generic' };
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
};

export type MissingParameterSummary = { elementType: string; missingParameters: string[] }[];

export type AnalysisSummary = {
  elementTypes: number;
  totalMissing: number;
  byElementType: { elementType: string; missingParameters: string[] }[];
};

type Retriever = Pick<RetrievalEngine, 'query'>;

export type AnswerRouterOptions = {
  engine: Retriever;
  generator?: AnswerGenerator | null;
  analysis?: AnalysisResult | null;
  topK?: number;
};

export class AnswerRouter {
  private analysis: Readonly<AnalysisResult> | null;
  private readonly engine: Retriever;
  private readonly generator: AnswerGenerator | null;
  private readonly topK: number;
  private current: RouterState = 'idle';

  constructor(options: AnswerRouterOptions) {
    this.engine = options.engine;
    this.generator = options.generator ?? null;
    this.topK = options.topK ?? 5;
    this.analysis = options.analysis ? deepFreeze(options.analysis) : null;
  }

  get state(): RouterState {
    return this.current;
  }

  get hasGenerator() {
    return this.generator !== null;
  }

  getAnalysis(): Readonly<AnalysisResult> | null {
    return this.analysis;
  }

  /** Swaps in the result of a completed analysis run; the previous snapshot is never mutated. */
  replaceAnalysis(result: AnalysisResult) {
    this.analysis = deepFreeze(result);
  }

  async answer(query: string, k = this.topK): Promise<Answer> {
    try {
      this.current = 'classifying';
      const route = classifyQuery(query);

      if (route.kind === 'structured') {
        this.current = 'structured_lookup';
        const response = this.describeMissingParameters(route.category);
        this.current = 'responding';
        return { query, response, sources: [], route: 'structured', generated: false };
      }

      this.current = 'generic_retrieval';
      const hits = await this.engine.query(query, k);
      this.current = 'responding';
      return await this.respond(query, hits);
    } finally {
      this.current = 'idle';
    }
  }

  private async respond(query: string, hits: RetrievedHit[]): Promise<Answer> {
    const base = { query, sources: hits, route: 'generic' as const };
    if (!this.generator) {
      return {
        ...base,
        response: `LLM integration is disabled. Here are the most relevant results:\n\n${formatContext(hits)}`,
        generated: false
      };
    }

    try {
      const response = await this.generator.generate(query, hits);
      return { ...base, response, generated: true };
    } catch (err) {
      log.warn('Answer generation failed; returning retrieved context', { error: errorMessage(err) });
      return {
        ...base,
        response: `Answer generation failed (${errorMessage(err)}). Here are the most relevant results:\n\n${formatContext(
          hits
        )}`,
        generated: false
      };
    }
  }

  missingParameterSummary(category: ElementCategory): MissingParameterSummary | null {
    if (!this.analysis) return null;
    return Object.entries(this.analysis.comparison.byElementType)
      .filter(([elementType]) => elementType.toLowerCase().includes(category))
      .map(([elementType, c]) => ({ elementType, missingParameters: [...c.missingParameters] }));
  }

  describeMissingParameters(category: ElementCategory): string {
    const summary = this.missingParameterSummary(category);
    if (!summary) return NO_ANALYSIS_RESPONSE;
    if (!summary.length) return `No missing ${category} parameters were found in the analysis.`;

    const sections = summary.map(({ elementType, missingParameters }) => {
      const lines = missingParameters.length ? missingParameters.map(p => `- ${p}`) : ['- No missing parameters'];
      return `For ${elementType}:\n${lines.join('\n')}`;
    });
    return `Here are the missing ${category} parameters based on the analysis:\n\n${sections.join('\n\n')}`;
  }

  analysisSummary(): AnalysisSummary | null {
    if (!this.analysis) return null;
    const byElementType = Object.entries(this.analysis.comparison.byElementType).map(([elementType, c]) => ({
      elementType,
      missingParameters: [...c.missingParameters]
    }));
    return {
      elementTypes: byElementType.length,
      totalMissing: byElementType.reduce((sum, e) => sum + e.missingParameters.length, 0),
      byElementType
    };
  }
}
