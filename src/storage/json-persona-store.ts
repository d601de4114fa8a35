import { z } from 'zod';
import type { Storage } from './storage.js';
import type { Logger } from '../types/logger.js';
import type { PersonaState } from '../types/persona.js';
import type { IPersonaStore } from '../ports/persona-store.js';
import { PersistenceFailure } from '../core/errors.js';

export const PERSONA_STATE_VERSION = 1;

const unit = z.number().min(0).max(1);

const personaStateSchema: z.ZodType<PersonaState> = z.object({
  name: z.string().min(1),
  traits: z.record(unit),
  interests: z.array(z.string()),
  identityStatements: z.array(z.string()),
  narrative: z.object({
    originStory: z.string(),
    worldview: z.string(),
    personalValues: z.array(z.string()),
  }),
  counters: z.object({
    interactions: z.number().int().nonnegative(),
    discoveries: z.number().int().nonnegative(),
    evaluations: z.number().int().nonnegative(),
  }),
});

const storedPersonaSchema = z.object({
  version: z.number().int().positive(),
  savedAt: z.string(),
  persona: personaStateSchema,
});

/**
 * JsonPersonaStore - persona persistence under a single storage key.
 */
export class JsonPersonaStore implements IPersonaStore {
  private readonly storage: Storage;
  private readonly logger: Logger;
  private readonly key: string;

  constructor(storage: Storage, logger: Logger, key = 'persona') {
    this.storage = storage;
    this.logger = logger.child({ component: 'persona-store' });
    this.key = key;
  }

  /**
   * Load the saved persona. A record that fails validation, or that a newer
   * version wrote, is logged and treated as absent, so the configured persona
   * is used instead.
   */
  async load(): Promise<PersonaState | null> {
    const data = await this.storage.load(this.key);
    if (data === null) return null;

    const parsed = storedPersonaSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.error(
        { issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
        'Stored persona is invalid, ignoring it'
      );
      return null;
    }

    if (parsed.data.version > PERSONA_STATE_VERSION) {
      this.logger.warn(
        { version: parsed.data.version, supported: PERSONA_STATE_VERSION },
        'Stored persona was written by a newer version, ignoring it'
      );
      return null;
    }

    this.logger.info({ savedAt: parsed.data.savedAt }, 'Persona loaded from storage');
    return parsed.data.persona;
  }

  async save(state: PersonaState): Promise<void> {
    try {
      await this.storage.save(this.key, {
        version: PERSONA_STATE_VERSION,
        savedAt: new Date().toISOString(),
        persona: structuredClone(state),
      });
    } catch (error) {
      throw new PersistenceFailure(
        'savePersona',
        error instanceof Error ? error.message : String(error),
        { cause: error }
      );
    }
    this.logger.debug('Persona saved');
  }
}
