import { ELEMENT_CATEGORIES, type ElementCategory } from './answer/router';
import type { RetrievedHit } from './types/schema';

export type SessionCommand =
  | { kind: 'empty' }
  | { kind: 'exit' }
  | { kind: 'analyze' }
  | { kind: 'compare'; schemaPath: string | null }
  | { kind: 'parameters'; category: ElementCategory }
  | { kind: 'summary' }
  | { kind: 'question'; text: string };

const EXIT_WORDS = new Set(['exit', 'quit', 'q']);
const SUMMARY_WORDS = new Set(['summary', 'analysis summary']);

const SOURCE_PREVIEW_LENGTH = 500;

const parameterShortcut = (line: string): ElementCategory | undefined =>
  ELEMENT_CATEGORIES.find(c => [`${c} parameters`, `${c} params`, `missing ${c} parameters`].includes(line));

/** Interprets one line of the interactive query session. Anything unrecognized is a question. */
export const parseSessionCommand = (input: string): SessionCommand => {
  const text = input.trim();
  const line = text.toLowerCase();
  if (!line) return { kind: 'empty' };
  if (EXIT_WORDS.has(line)) return { kind: 'exit' };
  if (line === 'analyze') return { kind: 'analyze' };
  if (line === 'compare' || line.startsWith('compare ')) {
    const schemaPath = text.slice('compare'.length).trim();
    return { kind: 'compare', schemaPath: schemaPath || null };
  }
  if (SUMMARY_WORDS.has(line)) return { kind: 'summary' };
  const category = parameterShortcut(line);
  if (category) return { kind: 'parameters', category };
  return { kind: 'question', text };
};

export const formatSources = (hits: readonly RetrievedHit[]) =>
  hits
    .map((hit, i) => {
      const preview =
        hit.content.length > SOURCE_PREVIEW_LENGTH ? `${hit.content.slice(0, SOURCE_PREVIEW_LENGTH)}...` : hit.content;
      return `Source ${i + 1} (Relevance: ${hit.score.toFixed(2)}):\n${preview}`;
    })
    .join('\n\n');
