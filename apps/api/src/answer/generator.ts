import { GoogleGenAI } from '@google/genai';
import { GenerationFailure, errorMessage } from '../errors';
import type { RetrievedHit } from '../types/schema';

export interface AnswerGenerator {
  generate(query: string, hits: readonly RetrievedHit[]): Promise<string>;
}

/** The context block shared by the prompt and every non-generated answer. */
export const formatContext = (hits: readonly RetrievedHit[]) =>
  hits.map((hit, i) => `Document ${i + 1} (Relevance: ${hit.score.toFixed(2)}):\n${hit.content}`).join('\n\n');

export const buildPrompt = (query: string, hits: readonly RetrievedHit[]) => `
You are an expert Building Information Modeling (BIM) assistant that helps users understand building models.
Answer the question based ONLY on the provided context about the building model.
If you cannot answer based on the context, say so clearly.

CONTEXT:
${formatContext(hits)}

QUESTION:
${query}

ANSWER:
`;

/**
 * Runs `work` with an abort signal that fires after `ms`; the returned promise then rejects
 * with `GenerationFailure` whether or not the work honours the signal.
 */
export const withTimeout = async <T>(
  work: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string
): Promise<T> => {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new GenerationFailure(`${label} timed out after ${ms}ms`));
    }, ms);
  });
  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
};

export class GeminiAnswerGenerator implements AnswerGenerator {
  private readonly ai: GoogleGenAI;

  constructor(
    apiKey: string,
    private readonly model = 'gemini-2.5-flash',
    private readonly timeoutMs = 30_000
  ) {
    this.ai = new GoogleGenAI({ apiKey });
  }

  async generate(query: string, hits: readonly RetrievedHit[]): Promise<string> {
    let text: string | undefined;
    try {
      const response = await withTimeout(
        abortSignal =>
          this.ai.models.generateContent({
            model: this.model,
            contents: buildPrompt(query, hits),
            config: { abortSignal }
          }),
        this.timeoutMs,
        'Gemini generation'
      );
      text = response.text;
    } catch (err) {
      if (err instanceof GenerationFailure) throw err;
      throw new GenerationFailure(`Gemini generation failed: ${errorMessage(err)}`, { cause: err });
    }
    if (!text?.trim()) throw new GenerationFailure('Gemini returned an empty response');
    return text.trim();
  }
}
