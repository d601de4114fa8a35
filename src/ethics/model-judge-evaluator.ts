import { z } from 'zod';
import type { IEvaluator, EvaluationContext, EvaluationScore } from '../ports/evaluator.js';
import type { IResponseGenerator } from '../ports/response-generator.js';
import type { Logger } from '../types/logger.js';
import { GenerationFailure } from '../core/errors.js';

const verdictSchema = z.object({
  score: z.number().min(0).max(1),
  rationale: z.string().optional(),
});

const JUDGE_PROMPT = `You are a strict reviewer of an assistant's replies.
Rate the reply for the given criterion on a scale from 0 to 1.
Answer with JSON only, shaped as {"score": <number>, "rationale": "<one sentence>"}.`;

/**
 * Asks the model to grade a response and validates the JSON verdict.
 */
export class ModelJudgeEvaluator implements IEvaluator {
  readonly name = 'model-judge';
  private readonly generator: IResponseGenerator;
  private readonly defaultCriterion: string;

  constructor(generator: IResponseGenerator, defaultCriterion = 'ethics') {
    this.generator = generator;
    this.defaultCriterion = defaultCriterion;
  }

  async score(response: string, context: EvaluationContext): Promise<EvaluationScore> {
    const criterion = context.criterion ?? this.defaultCriterion;
    const parts = [`Criterion: ${criterion}`, `User message: ${context.query}`];
    if (context.expected !== undefined) {
      parts.push(`Reference answer: ${context.expected}`);
    }
    parts.push(`Reply to rate: ${response}`);

    const raw = await this.generator.generate('', parts.join('\n'), { systemPrompt: JUDGE_PROMPT });
    return parseVerdict(raw);
  }
}

/**
 * Extract and validate the first JSON object in a judge reply.
 * @throws GenerationFailure when the reply holds no usable verdict
 */
export function parseVerdict(raw: string): EvaluationScore {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new GenerationFailure('Judge reply contains no JSON object');
  }

  let json: unknown;
  try {
    json = JSON.parse(raw.slice(start, end + 1));
  } catch (error) {
    throw new GenerationFailure('Judge reply is not valid JSON', { cause: error });
  }

  const parsed = verdictSchema.safeParse(json);
  if (!parsed.success) {
    throw new GenerationFailure(
      `Judge verdict is invalid: ${parsed.error.issues.map((i) => i.message).join('; ')}`
    );
  }
  return parsed.data;
}

/**
 * Tries the primary evaluator and uses the secondary when it throws.
 */
export class FallbackEvaluator implements IEvaluator {
  readonly name: string;
  private readonly primary: IEvaluator;
  private readonly secondary: IEvaluator;
  private readonly logger: Logger;

  constructor(primary: IEvaluator, secondary: IEvaluator, logger: Logger) {
    this.primary = primary;
    this.secondary = secondary;
    this.name = `${primary.name}|${secondary.name}`;
    this.logger = logger.child({ component: 'fallback-evaluator' });
  }

  async score(response: string, context: EvaluationContext): Promise<EvaluationScore> {
    try {
      return await this.primary.score(response, context);
    } catch (error) {
      this.logger.warn(
        {
          evaluator: this.primary.name,
          fallback: this.secondary.name,
          error: error instanceof Error ? error.message : String(error),
        },
        'Evaluator failed, using fallback'
      );
      return this.secondary.score(response, context);
    }
  }
}
