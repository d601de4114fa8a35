/**
 * Persona state types.
 */

/**
 * Traits every persona carries. Configuration may add more.
 */
export const CORE_TRAITS = ['curiosity', 'friendliness', 'analytical', 'empathy'] as const;

export type CoreTrait = (typeof CORE_TRAITS)[number];

/**
 * Trait name. Core traits are always present; any other name is allowed.
 */
export type TraitName = CoreTrait | (string & {});

export interface PersonaNarrative {
  originStory: string;
  worldview: string;
  personalValues: string[];
}

export interface PersonaCounters {
  interactions: number;
  discoveries: number;
  evaluations: number;
}

/**
 * The agent's identity. Every trait value stays within [0, 1].
 */
export interface PersonaState {
  name: string;
  traits: Record<string, number>;
  interests: string[];
  identityStatements: string[];
  narrative: PersonaNarrative;
  counters: PersonaCounters;
}

/**
 * A single applied trait adjustment.
 */
export interface TraitChange {
  trait: TraitName;
  before: number;
  after: number;
  source: 'interaction' | 'discovery' | 'evaluation' | 'manual';
}
