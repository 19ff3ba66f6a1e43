import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  buildClassificationPrompt,
  OpportunityClassifier,
  parseClassificationResponse,
} from '../../src/services/opportunity-classifier';
import { TextCompletionClient } from '../../src/services/ollama-client';

function fakeClient(impl: (model: string, prompt: string) => Promise<string>) {
  const complete = vi.fn(impl);
  const client: TextCompletionClient = { complete };
  return { client, complete };
}

describe('buildClassificationPrompt', () => {
  it('caps the description', () => {
    const prompt = buildClassificationPrompt('Title', 'x'.repeat(600), 'feedA');
    expect(prompt).toContain(`DESCRIPTION: ${'x'.repeat(500)}...\n`);
    expect(prompt).toContain('SOURCE: feedA');
  });
});

describe('parseClassificationResponse', () => {
  it('finds the verdict inside surrounding prose', () => {
    expect(parseClassificationResponse(
      'Sure! {"is_opportunity": true, "confidence": 0.92, "reasoning": "Explicit hiring post"} Hope that helps.'
    )).toEqual({ verdict: 'accept', confidence: 0.92, reasoning: 'Explicit hiring post' });
  });

  it('tolerates a bare key with no confidence', () => {
    expect(parseClassificationResponse('"is_opportunity": FALSE')).toEqual({
      verdict: 'reject',
      confidence: 0.5,
      reasoning: 'Parsed from response',
    });
  });

  it('clamps confidence into [0, 1]', () => {
    expect(parseClassificationResponse('{"is_opportunity": true, "confidence": 1.7}').confidence).toBe(1);
  });

  it('falls back to parsing the JSON object', () => {
    expect(parseClassificationResponse('{"is_opportunity": "yes", "confidence": "0.8"}')).toEqual({
      verdict: 'accept',
      confidence: 0.8,
      reasoning: 'No reasoning provided',
    });
  });

  it('rejects with low confidence when nothing is recognizable', () => {
    expect(parseClassificationResponse('I cannot decide')).toEqual({
      verdict: 'reject',
      confidence: 0.3,
      reasoning: 'Parse failed, rejecting to avoid false positive: I cannot decide',
    });
  });
});

describe('OpportunityClassifier', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('sends the prompt to the configured model', async () => {
    const { client, complete } = fakeClient(async () =>
      '{"is_opportunity": false, "confidence": 0.9, "reasoning": "Question"}'
    );
    const classifier = new OpportunityClassifier(client, { model: 'llama2', timeoutMs: 1000 });

    const result = await classifier.classify('How do I get an internship?', 'looking for advice', 'feedA');

    expect(result).toEqual({ verdict: 'reject', confidence: 0.9, reasoning: 'Question' });
    expect(complete.mock.calls[0][0]).toBe('llama2');
    expect(complete.mock.calls[0][1]).toContain('TITLE: How do I get an internship?');
  });

  it('rejects empty titles without calling the model', async () => {
    const { client, complete } = fakeClient(async () => '');
    const classifier = new OpportunityClassifier(client, { model: 'llama2', timeoutMs: 1000 });

    const result = await classifier.classify('  ', 'anything');

    expect(result).toEqual({ verdict: 'reject', confidence: 1, reasoning: 'Empty title - not an opportunity' });
    expect(complete).not.toHaveBeenCalled();
  });

  it('returns indeterminate when the call times out', async () => {
    vi.useFakeTimers();
    const { client } = fakeClient(() => new Promise<string>(() => undefined));
    const classifier = new OpportunityClassifier(client, { model: 'llama2', timeoutMs: 1000 });

    const pending = classifier.classify('Backend Engineer', 'Build APIs', 'feedA');
    await vi.advanceTimersByTimeAsync(1000);

    expect(await pending).toEqual({
      verdict: 'indeterminate',
      confidence: 0,
      reasoning: 'Classification timed out',
      error: 'Request timed out after 1 seconds',
    });
  });

  it('returns indeterminate when the endpoint is unreachable', async () => {
    const { client } = fakeClient(async () => {
      throw new Error('connect ECONNREFUSED');
    });
    const classifier = new OpportunityClassifier(client, { model: 'llama2', timeoutMs: 1000 });

    expect(await classifier.classify('Backend Engineer', '', 'feedA')).toEqual({
      verdict: 'indeterminate',
      confidence: 0,
      reasoning: 'Classifier could not be reached',
      error: 'connect ECONNREFUSED',
    });
  });

  it('treats an empty response as indeterminate', async () => {
    const { client } = fakeClient(async () => '');
    const classifier = new OpportunityClassifier(client, { model: 'llama2', timeoutMs: 1000 });

    const result = await classifier.classify('Backend Engineer', '', 'feedA');

    expect(result.verdict).toBe('indeterminate');
    expect(result.error).toBe('Empty response from classifier');
  });
});
