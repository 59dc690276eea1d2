import { AnswerGenerator, extractCitations } from '../retrieval/answer-generator';
import { GenerationError, PipelineAbortedError } from '../core/errors';
import { FusedContext } from '../types';
import { ScriptedCompletion, userMessage } from './helpers/fakes';
import { HIT_GUIDE, HIT_MANUAL, RESPONSIBLE_FACT, toChunk } from './helpers/fixtures';

const QUERY = 'Who maintains pump P-101?';

const CONTEXT: FusedContext = {
  evidence: [
    { provenance: 'graph', fact: RESPONSIBLE_FACT, score: 0.66, requiresCitation: false },
    { provenance: 'document', chunk: toChunk(HIT_MANUAL, 0), score: 0.628, requiresCitation: true, citation: 1 },
    { provenance: 'document', chunk: toChunk(HIT_GUIDE, 1), score: 0.544, requiresCitation: true, citation: 2 },
  ],
  intent: { intent: 'people', confidence: 0.9, reasoning: '' },
  topVectorScore: 0.82,
  topRerankScore: 0.66,
  confidence: 0.756,
  lowConfidence: false,
  noEvidence: false,
};

const EMPTY: FusedContext = {
  ...CONTEXT,
  evidence: [],
  topRerankScore: 0,
  confidence: 0,
  lowConfidence: true,
  noEvidence: true,
};

describe('extractCitations', () => {
  test('should return valid citations once, in order of appearance', () => {
    expect(extractCitations('See [2] and [1], again [2], not [7] or [0].', CONTEXT)).toEqual([2, 1]);
  });

  test('should return nothing when the context has no documents', () => {
    expect(extractCitations('Per [1].', EMPTY)).toEqual([]);
  });
});

describe('AnswerGenerator', () => {
  test('should present graph facts without numbers and documents with citation numbers', async () => {
    const completion = new ScriptedCompletion({ generate: () => 'John Smith maintains P-101 [1].' });
    const generator = new AnswerGenerator(completion);

    await generator.generate(QUERY, CONTEXT);

    const prompt = userMessage(completion.callsFor('generate')[0]);
    expect(prompt).toContain('GRAPH FACTS:\n- John Smith (Mechanical Technician) is responsible for P-101\n');
    expect(prompt).toContain('[1] (P-101 Maintenance Manual) Inspect the pump bearings every 500 operating hours.');
    expect(prompt).toContain('[2] (General Pump Guide) Centrifugal pumps require regular lubrication.');
    expect(prompt.endsWith(`Question: ${QUERY}`)).toBe(true);
  });

  test('should return the trimmed answer with its citations', async () => {
    const completion = new ScriptedCompletion({ generate: () => '  John Smith maintains P-101 [1].\n' });
    const generator = new AnswerGenerator(completion);

    expect(await generator.generate(QUERY, CONTEXT)).toEqual({
      text: 'John Smith maintains P-101 [1].',
      citations: [1],
    });
  });

  test('should tell the model when nothing was retrieved', async () => {
    const completion = new ScriptedCompletion({ generate: () => 'The knowledge base has no information on this.' });
    const generator = new AnswerGenerator(completion);

    const answer = await generator.generate(QUERY, EMPTY);

    expect(userMessage(completion.calls[0])).toContain('No evidence was retrieved.');
    expect(answer.citations).toEqual([]);
  });

  test('should fail with a generation error when the model call fails', async () => {
    const completion = new ScriptedCompletion({
      generate: () => {
        throw new Error('upstream 500');
      },
    });
    const generator = new AnswerGenerator(completion);

    await expect(generator.generate(QUERY, CONTEXT)).rejects.toBeInstanceOf(GenerationError);
  });

  test('should reject an empty answer', async () => {
    const generator = new AnswerGenerator(new ScriptedCompletion({ generate: () => '   ' }));

    await expect(generator.generate(QUERY, CONTEXT)).rejects.toThrow('Model returned an empty answer');
  });

  test('should report an abort when the caller cancels', async () => {
    const controller = new AbortController();
    controller.abort();
    const generator = new AnswerGenerator(new ScriptedCompletion());

    await expect(generator.generate(QUERY, CONTEXT, { signal: controller.signal })).rejects.toBeInstanceOf(
      PipelineAbortedError
    );
  });
});
