import { CORE_TRAITS } from '../types/persona.js';
import type { PersonaState } from '../types/persona.js';

/**
 * Value a trait takes when first touched.
 */
export const NEUTRAL_TRAIT_VALUE = 0.5;

export function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * `clamp(old + delta, 0, 1)`. A delta that makes the sum NaN leaves the value as it was.
 */
export function adjustedValue(old: number, delta: number): number {
  const next = old + delta;
  if (Number.isNaN(next)) return old;
  return clampUnit(next);
}

export interface PersonaSeed {
  name: string;
  traits: Record<string, number>;
  interests: string[];
  originStory: string;
  worldview: string;
  personalValues: string[];
}

/**
 * Build a fresh persona from configuration. Core traits missing from the seed
 * start neutral; every value is clamped.
 */
export function createPersonaState(seed: PersonaSeed): PersonaState {
  const traits: Record<string, number> = {};
  for (const trait of CORE_TRAITS) {
    traits[trait] = NEUTRAL_TRAIT_VALUE;
  }
  for (const [trait, value] of Object.entries(seed.traits)) {
    traits[trait] = Number.isNaN(value) ? NEUTRAL_TRAIT_VALUE : clampUnit(value);
  }

  return {
    name: seed.name,
    traits,
    interests: [...seed.interests],
    identityStatements: [],
    narrative: {
      originStory: seed.originStory,
      worldview: seed.worldview,
      personalValues: [...seed.personalValues],
    },
    counters: { interactions: 0, discoveries: 0, evaluations: 0 },
  };
}

/**
 * Prompt-ready description of a persona.
 */
export function describePersona(state: PersonaState): string {
  const traits = Object.entries(state.traits)
    .map(([trait, value]) => `${trait} ${value.toFixed(2)}`)
    .join(', ');

  const lines = [
    `You are ${state.name}.`,
    state.narrative.originStory,
    `Worldview: ${state.narrative.worldview}`,
    `Values: ${state.narrative.personalValues.join(', ')}`,
    `Traits (0-1): ${traits}`,
  ];
  if (state.interests.length > 0) {
    lines.push(`Interests: ${state.interests.join(', ')}`);
  }
  if (state.identityStatements.length > 0) {
    lines.push(...state.identityStatements);
  }
  lines.push('Speak in the first person as yourself, never as "an AI" or "the assistant".');
  return lines.join('\n');
}
