import { describe, it, expect, vi, afterEach } from 'vitest';
import { ClassificationGate } from '../../src/filters/classification-gate';
import {
  ClassificationResult,
  Classifier,
  OpportunityClassifier,
} from '../../src/services/opportunity-classifier';
import { ClassificationConfig } from '../../src/config';
import { makeCandidate } from '../helpers/fixtures';

type Policy = Pick<ClassificationConfig, 'enabled' | 'minConfidence' | 'rejectOnError' | 'skipSources'>;

const policy: Policy = {
  enabled: true,
  minConfidence: 0.7,
  rejectOnError: true,
  skipSources: ['remoteok', 'reddit_*'],
};

function fakeClassifier(result: ClassificationResult) {
  const classify = vi.fn(async (_title: string, _description: string, _source: string) => result);
  const classifier: Classifier = { classify };
  return { classifier, classify };
}

const indeterminate: ClassificationResult = {
  verdict: 'indeterminate',
  confidence: 0,
  reasoning: 'Classifier could not be reached',
  error: 'connect ECONNREFUSED',
};

describe('ClassificationGate', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('admits trusted sources without classifying', async () => {
    const { classifier, classify } = fakeClassifier({ verdict: 'reject', confidence: 1, reasoning: 'no' });
    const gate = new ClassificationGate(policy, classifier);

    expect(await gate.shouldAdmit(makeCandidate({ source: 'remoteok' }))).toBe(true);
    expect(await gate.decide(makeCandidate({ source: 'reddit_jobbit' }))).toEqual({
      admitted: true,
      reason: 'trusted_source',
    });
    expect(classify).not.toHaveBeenCalled();
  });

  it('admits everything when classification is disabled', async () => {
    const { classifier } = fakeClassifier({ verdict: 'reject', confidence: 1, reasoning: 'no' });
    const gate = new ClassificationGate({ ...policy, enabled: false }, classifier);

    expect((await gate.decide(makeCandidate())).reason).toBe('classification_disabled');
  });

  it('rejects empty titles', async () => {
    const { classifier } = fakeClassifier({ verdict: 'accept', confidence: 1, reasoning: 'yes' });
    const gate = new ClassificationGate(policy, classifier);

    expect(await gate.decide(makeCandidate({ title: ' ' }))).toEqual({ admitted: false, reason: 'empty_title' });
  });

  it('enforces the confidence floor', async () => {
    const { classifier } = fakeClassifier({ verdict: 'accept', confidence: 0.5, reasoning: 'maybe' });
    const gate = new ClassificationGate(policy, classifier);

    const decision = await gate.decide(makeCandidate());

    expect(decision).toEqual({
      admitted: false,
      reason: 'low_confidence',
      classification: { verdict: 'reject', confidence: 0.5, reasoning: 'maybe' },
    });
  });

  it('admits a confident accept and passes the source along', async () => {
    const { classifier, classify } = fakeClassifier({ verdict: 'accept', confidence: 0.9, reasoning: 'hiring' });
    const gate = new ClassificationGate(policy, classifier);

    expect(await gate.shouldAdmit(makeCandidate())).toBe(true);
    expect(classify).toHaveBeenCalledWith('Backend Engineer', 'Build APIs', 'feedA');
  });

  it('rejects a reject verdict', async () => {
    const { classifier } = fakeClassifier({ verdict: 'reject', confidence: 0.9, reasoning: 'question' });
    const gate = new ClassificationGate(policy, classifier);

    expect((await gate.decide(makeCandidate())).reason).toBe('rejected');
  });

  it('fails closed on indeterminate by default', async () => {
    const { classifier } = fakeClassifier(indeterminate);
    const gate = new ClassificationGate(policy, classifier);

    expect(await gate.decide(makeCandidate({ title: '[Hiring] Backend Engineer' }))).toEqual({
      admitted: false,
      reason: 'classifier_error',
      classification: indeterminate,
    });
  });

  it('uses the keyword fallback when configured', async () => {
    const { classifier } = fakeClassifier(indeterminate);
    const gate = new ClassificationGate({ ...policy, rejectOnError: false }, classifier);

    expect((await gate.decide(makeCandidate({ title: '[Hiring] Backend Engineer' }))).reason).toBe('fallback_accepted');
    expect((await gate.decide(makeCandidate({
      title: 'How do I get an internship?',
      description: 'looking for advice',
    }))).reason).toBe('fallback_rejected');
  });

  it('rejects every input when the classifier times out', async () => {
    vi.useFakeTimers();
    const classifier = new OpportunityClassifier(
      { complete: () => new Promise<string>(() => undefined) },
      { model: 'llama2', timeoutMs: 500 }
    );
    const gate = new ClassificationGate(policy, classifier);

    const pending = gate.shouldAdmit(makeCandidate({ title: '[Hiring] Backend Engineer', description: 'Apply now' }));
    await vi.advanceTimersByTimeAsync(500);

    expect(await pending).toBe(false);
  });

  describe('question posts', () => {
    const question = makeCandidate({
      title: 'How do I get an internship?',
      description: 'looking for advice',
      source: 'feedA',
    });

    it('are admitted when classification is disabled', async () => {
      const classifier = new OpportunityClassifier(
        { complete: async () => '{"is_opportunity": false, "confidence": 0.95, "reasoning": "Question"}' },
        { model: 'llama2', timeoutMs: 500 }
      );
      const gate = new ClassificationGate({ ...policy, enabled: false }, classifier);

      expect(await gate.shouldAdmit(question)).toBe(true);
    });

    it('are rejected by a working classifier', async () => {
      const classifier = new OpportunityClassifier(
        { complete: async () => '{"is_opportunity": false, "confidence": 0.95, "reasoning": "Question"}' },
        { model: 'llama2', timeoutMs: 500 }
      );
      const gate = new ClassificationGate(policy, classifier);

      expect(await gate.shouldAdmit(question)).toBe(false);
    });
  });
});
