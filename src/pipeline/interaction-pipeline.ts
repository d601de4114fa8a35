/**
 * Interaction Pipeline
 *
 * Every inbound message goes through the same ordered stages:
 *
 *   gate → context → generation → persona → ethics → correction → persistence
 *
 * The gate can short-circuit with the fixed safety reply. A generation failure
 * or cancellation skips straight to correction with the fallback text. The
 * ethics stage may send the candidate back through generation and persona
 * once; that is the only retry. Correction always runs, and nothing thrown
 * by an earlier stage escapes it.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '../types/logger.js';
import type {
  InboundMessage,
  Interaction,
  PipelineStep,
  ResponseKind,
} from '../types/interaction.js';
import type { IMemoryStore } from '../ports/memory-store.js';
import type { IResponseGenerator } from '../ports/response-generator.js';
import type { ISafetyGate } from '../safety/safety-gate.js';
import type { CorrectionMechanism } from '../safety/correction.js';
import type { IEthicsReviewer } from '../ethics/ethical-filter.js';
import type { PersonaTransform } from '../persona/persona-transform.js';
import type { InputRejected } from '../core/errors.js';
import { EthicalViolation } from '../core/errors.js';
import { assembleContext, type AssembledContext, type ContextConfig } from './context-assembler.js';
import { frozenCopy } from '../utils/freeze.js';

export interface PipelineDeps {
  gate: ISafetyGate;
  memory: IMemoryStore;
  generator: IResponseGenerator;
  persona: PersonaTransform;
  ethics: IEthicsReviewer;
  correction: CorrectionMechanism;
  logger: Logger;
}

export interface PipelineConfig {
  context: ContextConfig;
  /** Outcomes kept for the rolling quality metrics */
  statsWindow: number;
  /** Senders remembered for first-contact greetings; least recent forgotten first */
  maxKnownSenders: number;
}

export interface ProcessOptions {
  /** Polled between stages; once true, no further stage starts */
  isCancelled?: () => boolean;
  now?: Date;
}

export interface PipelineOutcome {
  admitted: boolean;
  responseText: string;
  /** The persisted record; null when the gate rejected the message */
  interaction: Interaction | null;
  persisted: boolean;
  trace: PipelineStep[];
  rejection?: InputRejected;
}

/**
 * Rolling pipeline quality, each value in [0, 1].
 */
export type PipelineMetrics = {
  response_quality: number;
  safety_compliance: number;
  ethical_alignment: number;
};

interface Candidate {
  text: string;
  kind: ResponseKind;
  flagged: EthicalViolation | null;
  ethicsScore: number | null;
}

interface OutcomeSample {
  kind: ResponseKind;
  ethicsScore: number | null;
}

const DEFAULT_STATS_WINDOW = 50;
const DEFAULT_MAX_KNOWN_SENDERS = 1000;

export class InteractionPipeline {
  private readonly deps: PipelineDeps;
  private readonly config: PipelineConfig;
  private readonly logger: Logger;
  private readonly knownSenders = new Set<string>();
  private readonly samples: OutcomeSample[] = [];
  private completedCount = 0;

  constructor(deps: PipelineDeps, config: Partial<PipelineConfig> & { context: ContextConfig }) {
    this.deps = deps;
    this.config = {
      statsWindow: DEFAULT_STATS_WINDOW,
      maxKnownSenders: DEFAULT_MAX_KNOWN_SENDERS,
      ...config,
    };
    this.logger = deps.logger.child({ component: 'pipeline' });
  }

  async process(message: InboundMessage, options: ProcessOptions = {}): Promise<PipelineOutcome> {
    const isCancelled = options.isCancelled ?? (() => false);
    const startedAt = options.now ?? new Date();
    const trace: PipelineStep[] = [];

    const decision = this.deps.gate.checkInput(message, startedAt);
    if (!decision.allowed) {
      trace.push('gate-reject');
      this.logger.info(
        { senderId: message.senderId, reason: decision.rejection.reason },
        'Message rejected by safety gate'
      );
      return {
        admitted: false,
        responseText: decision.reply,
        interaction: null,
        persisted: false,
        trace,
        rejection: decision.rejection,
      };
    }
    trace.push('gate-pass');

    const interactionId = randomUUID();
    const firstContact = !this.rememberSender(message.senderId);

    const candidate = await this.produceCandidate(
      message,
      interactionId,
      firstContact,
      trace,
      isCancelled
    );

    const corrected = this.deps.correction.review(candidate.text, { flagged: candidate.flagged });
    trace.push(corrected.replaced ? 'correction-replaced' : 'correction-pass');
    const kind: ResponseKind = corrected.replaced ? 'safety' : candidate.kind;

    const interaction = frozenCopy<Interaction>({
      id: interactionId,
      message,
      response: { text: corrected.text, kind },
      trace,
      ethicsScore: candidate.ethicsScore,
      startedAt,
      completedAt: new Date(),
    });

    const persisted = await this.persist(interaction);
    this.record({ kind, ethicsScore: candidate.ethicsScore });

    this.logger.debug({ interactionId, kind, trace }, 'Interaction complete');
    return {
      admitted: true,
      responseText: corrected.text,
      interaction,
      persisted,
      trace: [...trace],
    };
  }

  /**
   * Interactions that made it past the gate since startup.
   */
  getCompletedCount(): number {
    return this.completedCount;
  }

  metrics(): PipelineMetrics {
    if (this.samples.length === 0) {
      return { response_quality: 1, safety_compliance: 1, ethical_alignment: 1 };
    }

    const total = this.samples.length;
    const generated = this.samples.filter((s) => s.kind === 'generated').length;
    const safe = this.samples.filter((s) => s.kind !== 'safety').length;
    const scores = this.samples.flatMap((s) => (s.ethicsScore === null ? [] : [s.ethicsScore]));

    return {
      response_quality: generated / total,
      safety_compliance: safe / total,
      ethical_alignment:
        scores.length === 0 ? 1 : scores.reduce((sum, s) => sum + s, 0) / scores.length,
    };
  }

  /**
   * Stages 2-5. Always yields a candidate for the correction stage.
   */
  private async produceCandidate(
    message: InboundMessage,
    interactionId: string,
    firstContact: boolean,
    trace: PipelineStep[],
    isCancelled: () => boolean
  ): Promise<Candidate> {
    const cancelled = (): boolean => {
      if (!isCancelled()) return false;
      trace.push('cancelled');
      this.logger.info({ interactionId }, 'Interaction cancelled between stages');
      return true;
    };

    if (cancelled()) return this.fallback();
    const context = await this.assemble(message.text);
    trace.push(context.empty ? 'context-empty' : 'context-assembled');

    if (cancelled()) return this.fallback();
    const first = await this.generate(context.text, message.text, trace);
    if (first === null) return this.fallback();

    if (cancelled()) return this.fallback();
    let text = this.deps.persona.applyVoice(first, { firstContact });
    this.deps.persona.absorbInteraction(message.text);
    trace.push('persona-applied');

    if (cancelled()) return this.fallback();
    const verdict = await this.deps.ethics.review(text, { query: message.text, interactionId });
    if (verdict.passed) {
      trace.push('ethics-pass');
      return { text, kind: 'generated', flagged: null, ethicsScore: verdict.score };
    }

    trace.push('ethics-retry');
    this.logger.info(
      { interactionId, score: verdict.score },
      'Candidate failed ethics review, regenerating'
    );

    if (cancelled()) return this.fallback();
    const guidance = verdict.rationale ?? 'Rewrite the reply so it raises no ethical concerns.';
    const second = await this.generate(context.text, message.text, trace, guidance);
    if (second === null) return this.fallback();

    if (cancelled()) return this.fallback();
    text = this.deps.persona.applyVoice(second, { firstContact });
    trace.push('persona-applied');

    if (cancelled()) return this.fallback();
    const retried = await this.deps.ethics.review(text, { query: message.text, interactionId });
    if (retried.passed) {
      trace.push('ethics-pass');
      return { text, kind: 'generated', flagged: null, ethicsScore: retried.score };
    }

    trace.push('ethics-fail');
    this.logger.warn(
      { interactionId, score: retried.score },
      'Candidate failed ethics review twice'
    );
    return {
      text,
      kind: 'generated',
      flagged: new EthicalViolation(retried.score, retried.rationale),
      ethicsScore: retried.score,
    };
  }

  private fallback(): Candidate {
    return {
      text: this.deps.correction.fallbackResponse,
      kind: 'fallback',
      flagged: null,
      ethicsScore: null,
    };
  }

  private async assemble(query: string): Promise<AssembledContext> {
    try {
      return await assembleContext(this.deps.memory, query, this.config.context);
    } catch (error) {
      this.logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Context assembly failed, continuing without context'
      );
      return { items: [], recent: [], text: '', empty: true };
    }
  }

  /**
   * One generation attempt. Records the outcome in the trace.
   * @returns The raw text, or null on failure
   */
  private async generate(
    context: string,
    query: string,
    trace: PipelineStep[],
    guidance?: string
  ): Promise<string | null> {
    try {
      const text = await this.deps.generator.generate(
        context,
        query,
        guidance === undefined ? undefined : { guidance }
      );
      trace.push('generated');
      return text;
    } catch (error) {
      trace.push('generation-failed');
      this.logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Response generation failed, using fallback'
      );
      return null;
    }
  }

  private async persist(interaction: Interaction): Promise<boolean> {
    try {
      await this.deps.memory.storeInteraction(interaction);
      return true;
    } catch (error) {
      this.logger.error(
        {
          interactionId: interaction.id,
          error: error instanceof Error ? error.message : String(error),
        },
        'Failed to persist interaction'
      );
      return false;
    }
  }

  private record(sample: OutcomeSample): void {
    this.completedCount++;
    this.samples.push(sample);
    if (this.samples.length > this.config.statsWindow) {
      this.samples.shift();
    }
  }

  /**
   * Mark a sender as most recently seen.
   * @returns Whether the sender was already known
   */
  private rememberSender(senderId: string): boolean {
    const known = this.knownSenders.delete(senderId);
    this.knownSenders.add(senderId);
    if (this.knownSenders.size > this.config.maxKnownSenders) {
      for (const oldest of this.knownSenders) {
        this.knownSenders.delete(oldest);
        break;
      }
    }
    return known;
  }
}
