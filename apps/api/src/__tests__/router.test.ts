import { describe, it, expect, vi } from 'vitest';
import { AnswerRouter, NO_ANALYSIS_RESPONSE, classifyQuery } from '../answer/router';
import { formatContext, type AnswerGenerator } from '../answer/generator';
import { CollectionNotFoundError, GenerationFailure } from '../errors';
import type { AnalysisResult, ElementComparison, RetrievedHit } from '../types/schema';

const comparison = (missingParameters: string[]): ElementComparison => ({
  missingParameters,
  extraParameters: [],
  lowFillRequired: [],
  possibleRenames: []
});

const analysis = (): AnalysisResult => ({
  schemas: {},
  comparison: {
    byElementType: {
      wall: comparison(['FireRating', 'LoadBearing']),
      windows: comparison([]),
      door: comparison(['Width'])
    },
    diagnostics: []
  },
  reportPath: 'bim_analysis_report.html',
  generatedAt: '2024-05-01T10:00:00.000Z'
});

const hit: RetrievedHit = {
  id: 'wall_0',
  content: 'GlobalId: A1 Name: Wall 1 ElementType: wall',
  metadata: { GlobalId: 'A1' },
  distance: 0.25,
  score: 0.75
};

const engineReturning = (hits: RetrievedHit[]) => ({ query: vi.fn(async () => hits) });

describe('classifyQuery', () => {
  it('routes missing-parameter questions about a known category', () => {
    expect(classifyQuery('What are the missing wall parameters?')).toEqual({ kind: 'structured', category: 'wall' });
    expect(classifyQuery('Missing PARAMETERS for Windows')).toEqual({ kind: 'structured', category: 'window' });
  });

  it('prefers wall, then door, window and slab when several categories appear', () => {
    expect(classifyQuery('missing parameters for slabs and doors')).toEqual({ kind: 'structured', category: 'door' });
    expect(classifyQuery('missing parameters on doors next to walls')).toEqual({
      kind: 'structured',
      category: 'wall'
    });
  });

  it('sends everything else to retrieval', () => {
    expect(classifyQuery('Which walls are load bearing?')).toEqual({ kind: 'generic' });
    expect(classifyQuery('missing parameters for roofs')).toEqual({ kind: 'generic' });
  });
});

describe('AnswerRouter', () => {
  it('answers missing-parameter questions from the analysis without retrieval', async () => {
    const engine = engineReturning([hit]);
    const router = new AnswerRouter({ engine, analysis: analysis() });

    const answer = await router.answer('What are the missing wall parameters?');
    expect(answer.response).toBe(
      'Here are the missing wall parameters based on the analysis:\n\nFor wall:\n- FireRating\n- LoadBearing'
    );
    expect(answer).toMatchObject({ route: 'structured', sources: [], generated: false });
    expect(engine.query).not.toHaveBeenCalled();
  });

  it('matches element types that contain the category name', async () => {
    const router = new AnswerRouter({ engine: engineReturning([]), analysis: analysis() });
    const answer = await router.answer('any missing window parameters?');
    expect(answer.response).toBe(
      'Here are the missing window parameters based on the analysis:\n\nFor windows:\n- No missing parameters'
    );
  });

  it('says so when no element type matches the category', async () => {
    const router = new AnswerRouter({ engine: engineReturning([]), analysis: analysis() });
    const answer = await router.answer('missing slab parameters');
    expect(answer.response).toBe('No missing slab parameters were found in the analysis.');
  });

  it('asks for an analysis run when none is loaded', async () => {
    const router = new AnswerRouter({ engine: engineReturning([]) });
    expect((await router.answer('What are the missing wall parameters?')).response).toBe(NO_ANALYSIS_RESPONSE);
  });

  it('lists retrieved documents when no generator is configured', async () => {
    const engine = engineReturning([hit]);
    const router = new AnswerRouter({ engine, topK: 3 });

    const answer = await router.answer('Which walls are load bearing?');
    expect(answer.response).toBe(
      'LLM integration is disabled. Here are the most relevant results:\n\n' +
        'Document 1 (Relevance: 0.75):\nGlobalId: A1 Name: Wall 1 ElementType: wall'
    );
    expect(answer).toMatchObject({ route: 'generic', generated: false, sources: [hit] });
    expect(engine.query).toHaveBeenCalledWith('Which walls are load bearing?', 3);
  });

  it('returns generated answers', async () => {
    const generator: AnswerGenerator = { generate: vi.fn(async () => 'Wall 1 is rated REI60.') };
    const router = new AnswerRouter({ engine: engineReturning([hit]), generator });

    const answer = await router.answer('What is the fire rating of Wall 1?', 2);
    expect(answer).toMatchObject({ response: 'Wall 1 is rated REI60.', generated: true });
    expect(generator.generate).toHaveBeenCalledWith('What is the fire rating of Wall 1?', [hit]);
  });

  it('falls back to the retrieved context when generation fails', async () => {
    const generator: AnswerGenerator = {
      generate: vi.fn(async () => {
        throw new GenerationFailure('Gemini generation timed out after 10ms');
      })
    };
    const router = new AnswerRouter({ engine: engineReturning([hit]), generator });

    const answer = await router.answer('Describe the walls');
    expect(answer.response).toBe(
      `Answer generation failed (Gemini generation timed out after 10ms). Here are the most relevant results:\n\n${formatContext(
        [hit]
      )}`
    );
    expect(answer.generated).toBe(false);
  });

  it('returns to idle after a failed retrieval', async () => {
    const engine = {
      query: vi.fn(async (): Promise<RetrievedHit[]> => {
        throw new CollectionNotFoundError('bim_elements');
      })
    };
    const router = new AnswerRouter({ engine });

    await expect(router.answer('Describe the walls')).rejects.toBeInstanceOf(CollectionNotFoundError);
    expect(router.state).toBe('idle');
  });

  it('freezes the analysis snapshot it serves', () => {
    const router = new AnswerRouter({ engine: engineReturning([]) });
    router.replaceAnalysis(analysis());
    expect(Object.isFrozen(router.getAnalysis()?.comparison.byElementType.wall.missingParameters)).toBe(true);
  });

  it('summarizes missing parameters per element type', () => {
    const router = new AnswerRouter({ engine: engineReturning([]), analysis: analysis() });
    expect(router.analysisSummary()).toEqual({
      elementTypes: 3,
      totalMissing: 3,
      byElementType: [
        { elementType: 'wall', missingParameters: ['FireRating', 'LoadBearing'] },
        { elementType: 'windows', missingParameters: [] },
        { elementType: 'door', missingParameters: ['Width'] }
      ]
    });
  });
});

describe('formatContext', () => {
  it('numbers documents and shows two-decimal relevance', () => {
    expect(formatContext([hit, { ...hit, id: 'wall_1', content: 'Name: Wall 2', score: 0.5 }])).toBe(
      'Document 1 (Relevance: 0.75):\nGlobalId: A1 Name: Wall 1 ElementType: wall\n\nDocument 2 (Relevance: 0.50):\nName: Wall 2'
    );
  });
});
