import { describe, it, expect } from 'vitest';
import { formatSources, parseSessionCommand } from '../session';
import type { RetrievedHit } from '../types/schema';

describe('parseSessionCommand', () => {
  it('recognizes exit words and blank lines', () => {
    expect(parseSessionCommand('  QUIT ')).toEqual({ kind: 'exit' });
    expect(parseSessionCommand('q')).toEqual({ kind: 'exit' });
    expect(parseSessionCommand('   ')).toEqual({ kind: 'empty' });
  });

  it('recognizes analysis commands', () => {
    expect(parseSessionCommand('analyze')).toEqual({ kind: 'analyze' });
    expect(parseSessionCommand('compare schemas/Expected.json')).toEqual({
      kind: 'compare',
      schemaPath: 'schemas/Expected.json'
    });
    expect(parseSessionCommand('compare')).toEqual({ kind: 'compare', schemaPath: null });
    expect(parseSessionCommand('Analysis Summary')).toEqual({ kind: 'summary' });
  });

  it('recognizes parameter shortcuts for each category', () => {
    expect(parseSessionCommand('wall parameters')).toEqual({ kind: 'parameters', category: 'wall' });
    expect(parseSessionCommand('door params')).toEqual({ kind: 'parameters', category: 'door' });
    expect(parseSessionCommand('missing slab parameters')).toEqual({ kind: 'parameters', category: 'slab' });
  });

  it('treats everything else as a question', () => {
    expect(parseSessionCommand(' Which walls are external? ')).toEqual({
      kind: 'question',
      text: 'Which walls are external?'
    });
    expect(parseSessionCommand('comparE walls')).toEqual({ kind: 'compare', schemaPath: 'walls' });
    expect(parseSessionCommand('comparison of walls')).toEqual({ kind: 'question', text: 'comparison of walls' });
  });
});

describe('formatSources', () => {
  const hit = (content: string, score: number): RetrievedHit => ({
    id: 'wall_0',
    content,
    metadata: {},
    distance: 1 - score,
    score
  });

  it('numbers sources with their relevance', () => {
    expect(formatSources([hit('Name: Wall 1', 0.8), hit('Name: Wall 2', 0.25)])).toBe(
      'Source 1 (Relevance: 0.80):\nName: Wall 1\n\nSource 2 (Relevance: 0.25):\nName: Wall 2'
    );
  });

  it('shortens long content', () => {
    const [, body] = formatSources([hit('x'.repeat(600), 0.5)]).split('\n');
    expect(body).toBe(`${'x'.repeat(500)}...`);
  });
});
