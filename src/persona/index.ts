/**
 * Persona module exports.
 */

export type { PersonaSeed } from './traits.js';
export {
  NEUTRAL_TRAIT_VALUE,
  clampUnit,
  adjustedValue,
  createPersonaState,
  describePersona,
} from './traits.js';
export type { IPersonaVoice, VoiceOptions } from './voice.js';
export { TemplateVoice } from './voice.js';
export type { PersonaTransformConfig, EvaluationFeedback } from './persona-transform.js';
export { PersonaTransform, CRITERION_TRAITS } from './persona-transform.js';
