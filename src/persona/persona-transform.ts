/**
 * Persona Transform
 *
 * Sole owner of the persona state. Applies the persona voice to candidate
 * responses and moves traits in response to interactions, discoveries and
 * evaluations. Every trait stays within [0, 1].
 */

import type { Logger } from '../types/logger.js';
import type { PersonaState, TraitChange, TraitName } from '../types/persona.js';
import type { Discovery } from '../types/discovery.js';
import type { IPersonaVoice } from './voice.js';
import { adjustedValue, NEUTRAL_TRAIT_VALUE } from './traits.js';
import { matchKeywords } from '../utils/text.js';

export interface PersonaTransformConfig {
  interactionDelta: number;
  discoveryDelta: number;
  evaluationWeight: number;
  /** Criterion scores above this raise traits, below it lower them */
  evaluationThreshold: number;
  positiveWords: string[];
  negativeWords: string[];
  analyticalWords: string[];
  emotionalRegister: string[];
  analyticalRegister: string[];
  identityKeywords: string[];
  maxInterests: number;
  maxIdentityStatements: number;
}

const DEFAULT_CONFIG: PersonaTransformConfig = {
  interactionDelta: 0.02,
  discoveryDelta: 0.02,
  evaluationWeight: 0.2,
  evaluationThreshold: 0.7,
  positiveWords: [],
  negativeWords: [],
  analyticalWords: [],
  emotionalRegister: [],
  analyticalRegister: [],
  identityKeywords: [],
  maxInterests: 20,
  maxIdentityStatements: 20,
};

/**
 * Which trait an evaluation criterion feeds.
 */
export const CRITERION_TRAITS: Record<string, TraitName> = {
  accuracy: 'analytical',
  coherence: 'analytical',
  relevance: 'curiosity',
  knowledge: 'curiosity',
  helpfulness: 'friendliness',
};

export interface EvaluationFeedback {
  /** Criterion name → score in [0, 1] */
  criteria: Record<string, number>;
  /** Evaluator confidence in [0, 1] */
  confidence: number;
}

export class PersonaTransform {
  private readonly state: PersonaState;
  private readonly voice: IPersonaVoice;
  private readonly logger: Logger;
  private readonly config: PersonaTransformConfig;
  private changeCount = 0;

  constructor(
    initial: PersonaState,
    voice: IPersonaVoice,
    logger: Logger,
    config: Partial<PersonaTransformConfig> = {}
  ) {
    this.state = structuredClone(initial);
    this.voice = voice;
    this.logger = logger.child({ component: 'persona' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get name(): string {
    return this.state.name;
  }

  /**
   * Independent copy of the current state.
   */
  snapshot(): PersonaState {
    return structuredClone(this.state);
  }

  /**
   * Number of applied changes since startup. Only ever grows.
   */
  getChangeCount(): number {
    return this.changeCount;
  }

  getTrait(trait: TraitName): number {
    return this.state.traits[trait] ?? NEUTRAL_TRAIT_VALUE;
  }

  applyVoice(raw: string, options: { firstContact: boolean }): string {
    return this.voice.apply(raw, { name: this.state.name, firstContact: options.firstContact });
  }

  /**
   * Move one trait by a signed delta. Unknown traits start neutral.
   * @returns The change, or null when the value did not move
   */
  adjustTrait(
    trait: TraitName,
    delta: number,
    source: TraitChange['source'] = 'manual'
  ): TraitChange | null {
    const before = this.getTrait(trait);
    const after = adjustedValue(before, delta);
    if (after === before && trait in this.state.traits) {
      return null;
    }

    this.state.traits[trait] = after;
    this.changeCount++;
    this.logger.trace({ trait, before, after, source }, 'Trait adjusted');
    return { trait, before, after, source };
  }

  /**
   * Nudge traits from the tone of an inbound message.
   */
  absorbInteraction(text: string): TraitChange[] {
    const step = this.config.interactionDelta;
    const changes: (TraitChange | null)[] = [];

    if (matchKeywords(text, this.config.positiveWords).length > 0) {
      changes.push(this.adjustTrait('friendliness', step, 'interaction'));
    }
    if (matchKeywords(text, this.config.negativeWords).length > 0) {
      changes.push(this.adjustTrait('friendliness', -step, 'interaction'));
      changes.push(this.adjustTrait('empathy', step, 'interaction'));
    }
    if (text.includes('?')) {
      changes.push(this.adjustTrait('curiosity', step / 2, 'interaction'));
    }
    if (matchKeywords(text, this.config.analyticalWords).length > 0) {
      changes.push(this.adjustTrait('analytical', step / 2, 'interaction'));
    }

    this.state.counters.interactions++;
    return compact(changes);
  }

  /**
   * Let a discovery shape traits, interests and identity.
   */
  absorbDiscovery(discovery: Discovery): TraitChange[] {
    const step = this.config.discoveryDelta;
    const text = `${discovery.topic} ${discovery.content}`;
    const changes: (TraitChange | null)[] = [];

    if (matchKeywords(text, this.config.emotionalRegister).length > 0) {
      changes.push(this.adjustTrait('empathy', step, 'discovery'));
    }
    if (matchKeywords(text, this.config.analyticalRegister).length > 0) {
      changes.push(this.adjustTrait('analytical', step, 'discovery'));
    }
    changes.push(this.adjustTrait('curiosity', step / 2, 'discovery'));

    this.addInterest(discovery.topic);

    if (matchKeywords(text, this.config.identityKeywords).length > 0) {
      this.addIdentityStatement(`I am shaped by what I learn about ${discovery.topic}.`);
    }

    this.state.counters.discoveries++;
    return compact(changes);
  }

  /**
   * Apply confidence-weighted deltas from an evaluation. Criteria without a
   * mapped trait are ignored.
   */
  absorbEvaluation(feedback: EvaluationFeedback): TraitChange[] {
    const changes: (TraitChange | null)[] = [];

    for (const [criterion, score] of Object.entries(feedback.criteria)) {
      const trait = CRITERION_TRAITS[criterion];
      if (trait === undefined) continue;
      const delta =
        (score - this.config.evaluationThreshold) *
        this.config.evaluationWeight *
        feedback.confidence;
      changes.push(this.adjustTrait(trait, delta, 'evaluation'));
    }

    this.state.counters.evaluations++;
    return compact(changes);
  }

  private addInterest(topic: string): void {
    const normalized = topic.trim();
    if (normalized.length === 0) return;
    const exists = this.state.interests.some((i) => i.toLowerCase() === normalized.toLowerCase());
    if (exists) return;

    this.state.interests.push(normalized);
    if (this.state.interests.length > this.config.maxInterests) {
      this.state.interests.shift();
    }
    this.changeCount++;
  }

  private addIdentityStatement(statement: string): void {
    if (this.state.identityStatements.includes(statement)) return;

    this.state.identityStatements.push(statement);
    if (this.state.identityStatements.length > this.config.maxIdentityStatements) {
      this.state.identityStatements.shift();
    }
    this.changeCount++;
    this.logger.info({ statement }, 'Identity statement added');
  }
}

function compact(changes: (TraitChange | null)[]): TraitChange[] {
  return changes.filter((c): c is TraitChange => c !== null);
}
