import { CandidateOpportunity } from '../types/opportunity';
import { ClassificationConfig } from '../config';
import { ClassificationResult, Classifier } from '../services/opportunity-classifier';
import { keywordFallback } from './keyword-fallback';
import { logger } from '../utils/logger';

export type GateReason =
  | 'trusted_source'
  | 'classification_disabled'
  | 'empty_title'
  | 'accepted'
  | 'low_confidence'
  | 'rejected'
  | 'classifier_error'
  | 'fallback_accepted'
  | 'fallback_rejected';

export interface GateDecision {
  admitted: boolean;
  reason: GateReason;
  classification?: ClassificationResult;
}

type GatePolicy = Pick<
  ClassificationConfig,
  'enabled' | 'minConfidence' | 'rejectOnError' | 'skipSources'
>;

/**
 * Trust boundary between free-text sources and storage.
 * Fails closed unless the policy asks for the keyword fallback.
 */
export class ClassificationGate {
  constructor(
    private readonly policy: GatePolicy,
    private readonly classifier: Classifier
  ) {}

  /**
   * Skip-list entries match exactly; an entry ending in "*" matches a prefix ("reddit_*")
   */
  isTrustedSource(source: string): boolean {
    return this.policy.skipSources.some(entry =>
      entry.endsWith('*') ? source.startsWith(entry.slice(0, -1)) : entry === source
    );
  }

  async decide(candidate: CandidateOpportunity): Promise<GateDecision> {
    if (this.isTrustedSource(candidate.source)) {
      return { admitted: true, reason: 'trusted_source' };
    }

    if (!this.policy.enabled) {
      return { admitted: true, reason: 'classification_disabled' };
    }

    if (!candidate.title.trim()) {
      return { admitted: false, reason: 'empty_title' };
    }

    const classification = await this.classifier.classify(
      candidate.title,
      candidate.description,
      candidate.source
    );

    switch (classification.verdict) {
      case 'accept':
        return classification.confidence >= this.policy.minConfidence
          ? { admitted: true, reason: 'accepted', classification }
          : { admitted: false, reason: 'low_confidence', classification: { ...classification, verdict: 'reject' } };

      case 'reject':
        return { admitted: false, reason: 'rejected', classification };

      case 'indeterminate': {
        if (this.policy.rejectOnError) {
          return { admitted: false, reason: 'classifier_error', classification };
        }
        const fallback = keywordFallback(candidate.title, candidate.description);
        logger.debug(`Keyword fallback: ${fallback.reason}`, { title: candidate.title });
        return {
          admitted: fallback.admitted,
          reason: fallback.admitted ? 'fallback_accepted' : 'fallback_rejected',
          classification,
        };
      }
    }
  }

  async shouldAdmit(candidate: CandidateOpportunity): Promise<boolean> {
    const decision = await this.decide(candidate);
    if (!decision.admitted) {
      logger.debug(`Gate rejected candidate: ${decision.reason}`, {
        title: candidate.title,
        source: candidate.source,
        confidence: decision.classification?.confidence,
        reasoning: decision.classification?.reasoning,
      });
    }
    return decision.admitted;
  }
}
