import { z } from 'zod';
import { TextCompletionClient } from './ollama-client';
import { ClassifierUnavailableError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type ClassificationVerdict = 'accept' | 'reject' | 'indeterminate';

export interface ClassificationResult {
  verdict: ClassificationVerdict;
  confidence: number;
  reasoning: string;
  error?: string;
}

export interface ClassifierOptions {
  model: string;
  timeoutMs: number;
}

const MAX_PROMPT_DESCRIPTION = 500;
const PARSE_FAILURE_CONFIDENCE = 0.3;
const DEFAULT_CONFIDENCE = 0.5;

export function buildClassificationPrompt(title: string, description: string, source: string): string {
  const body = description.length > MAX_PROMPT_DESCRIPTION
    ? `${description.slice(0, MAX_PROMPT_DESCRIPTION)}...`
    : description;

  return `You classify posts for an opportunity board. Decide whether the post below OFFERS an opportunity (a job, internship, workshop, conference, competition or similar that a reader can apply to or attend) or is NOT an opportunity (a question, discussion, request for advice, someone looking for work, general conversation).

Posts that ARE opportunities:
- "[Hiring] Software Engineer - Remote position available. Apply at..."
- "Summer Internship Program - We're accepting applications for interns in..."
- "Free Python Workshop next Saturday - Learn web development..."
- "Regional Tech Conference - Early bird tickets available now..."

Posts that are NOT opportunities:
- "How do I find an internship? Looking for advice"
- "What's the best way to prepare for job interviews?"
- "Has anyone here done an internship at a big tech company?"
- "Looking for internship opportunities, any suggestions?"

SOURCE: ${source}
TITLE: ${title}
DESCRIPTION: ${body}

Reply with ONLY a JSON object in exactly this format:
{
  "is_opportunity": true or false,
  "confidence": 0.0 to 1.0,
  "reasoning": "one short sentence"
}

Be strict:
- Questions (how, what, where, when, why, any?) are never opportunities
- Requests for advice, recommendations or tips are never opportunities
- Job seekers "looking for" work are never opportunities
- Only answer true when the post explicitly offers something to apply to or attend
- When in doubt, answer false`;
}

function clampConfidence(value: number): number {
  if (isNaN(value)) return DEFAULT_CONFIDENCE;
  return Math.max(0, Math.min(1, value));
}

const ClassificationJsonSchema = z.object({
  is_opportunity: z.union([z.boolean(), z.string(), z.number()]),
  confidence: z.union([z.number(), z.string()]).optional(),
  reasoning: z.unknown().optional(),
});

function truthy(value: boolean | string | number): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  return ['true', 'yes', '1'].includes(value.trim().toLowerCase());
}

/**
 * Reads a verdict out of free-form model output.
 * Order: tolerant key match, then JSON parse, then reject.
 */
export function parseClassificationResponse(responseText: string): ClassificationResult {
  const opportunityMatch = responseText.match(/"is_opportunity"\s*:\s*(true|false)/i);
  if (opportunityMatch) {
    const confidenceMatch = responseText.match(/"confidence"\s*:\s*([\d.]+)/);
    const reasoningMatch = responseText.match(/"reasoning"\s*:\s*"([^"]*)"/);
    return {
      verdict: opportunityMatch[1].toLowerCase() === 'true' ? 'accept' : 'reject',
      confidence: confidenceMatch ? clampConfidence(parseFloat(confidenceMatch[1])) : DEFAULT_CONFIDENCE,
      reasoning: reasoningMatch ? reasoningMatch[1] : 'Parsed from response',
    };
  }

  const jsonMatch = responseText.match(/\{[^{}]*"is_opportunity"[^{}]*\}/);
  if (jsonMatch) {
    try {
      const parsed = ClassificationJsonSchema.parse(JSON.parse(jsonMatch[0]));
      return {
        verdict: truthy(parsed.is_opportunity) ? 'accept' : 'reject',
        confidence: parsed.confidence === undefined
          ? DEFAULT_CONFIDENCE
          : clampConfidence(Number(parsed.confidence)),
        reasoning: parsed.reasoning === undefined ? 'No reasoning provided' : String(parsed.reasoning),
      };
    } catch (error) {
      logger.debug('Classifier JSON could not be parsed', { error: errorMessage(error) });
    }
  }

  return {
    verdict: 'reject',
    confidence: PARSE_FAILURE_CONFIDENCE,
    reasoning: `Parse failed, rejecting to avoid false positive: ${responseText.slice(0, 100)}`,
  };
}

/**
 * Rejects with ClassifierUnavailableError when the call outlives the timeout.
 * The underlying request is left to finish on its own.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new ClassifierUnavailableError(`Request timed out after ${timeoutMs / 1000} seconds`, true)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface Classifier {
  classify(title: string, description: string, source: string): Promise<ClassificationResult>;
}

/**
 * Language-model classifier deciding whether a post is a genuine opportunity
 */
export class OpportunityClassifier implements Classifier {
  constructor(
    private readonly client: TextCompletionClient,
    private readonly options: ClassifierOptions
  ) {}

  async classify(title: string, description: string, source: string = 'unknown'): Promise<ClassificationResult> {
    if (!title.trim()) {
      return {
        verdict: 'reject',
        confidence: 1,
        reasoning: 'Empty title - not an opportunity',
      };
    }

    const prompt = buildClassificationPrompt(title, description, source);

    try {
      const responseText = await withTimeout(
        this.client.complete(this.options.model, prompt),
        this.options.timeoutMs
      );

      if (!responseText) {
        throw new ClassifierUnavailableError('Empty response from classifier');
      }

      return parseClassificationResponse(responseText);
    } catch (error) {
      const message = errorMessage(error);
      logger.warn('Classification unavailable', { title, source, error: message });
      return {
        verdict: 'indeterminate',
        confidence: 0,
        reasoning: error instanceof ClassifierUnavailableError && error.timedOut
          ? 'Classification timed out'
          : 'Classifier could not be reached',
        error: message,
      };
    }
  }
}
