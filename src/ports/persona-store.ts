/**
 * Persona Store Port
 */

import type { PersonaState } from '../types/persona.js';

export interface IPersonaStore {
  /**
   * Load the saved persona, or null when none has been saved yet.
   */
  load(): Promise<PersonaState | null>;

  save(state: PersonaState): Promise<void>;
}
