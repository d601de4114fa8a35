import { z } from 'zod';
import type { Storage } from './storage.js';
import { isFlushable } from './storage.js';
import type { Logger } from '../types/logger.js';
import type {
  Interaction,
  ReflectionRecord,
  ContextItem,
  PipelineStep,
} from '../types/interaction.js';
import type { IMemoryStore } from '../ports/memory-store.js';
import { PersistenceFailure } from '../core/errors.js';
import { queryCoverage } from '../utils/text.js';

const PIPELINE_STEPS = [
  'gate-pass',
  'gate-reject',
  'context-empty',
  'context-assembled',
  'generated',
  'generation-failed',
  'persona-applied',
  'ethics-pass',
  'ethics-retry',
  'ethics-fail',
  'correction-pass',
  'correction-replaced',
  'cancelled',
] as const satisfies readonly PipelineStep[];

const interactionSchema: z.ZodType<Interaction, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  message: z.object({
    id: z.string(),
    senderId: z.string(),
    text: z.string(),
    receivedAt: z.coerce.date(),
  }),
  response: z
    .object({
      text: z.string(),
      kind: z.enum(['generated', 'fallback', 'safety']),
    })
    .nullable(),
  trace: z.array(z.enum(PIPELINE_STEPS)),
  ethicsScore: z.number().nullable(),
  startedAt: z.coerce.date(),
  completedAt: z.coerce.date().nullable(),
});

const reflectionSchema: z.ZodType<ReflectionRecord, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  kind: z.enum(['interaction', 'ethical']),
  createdAt: z.coerce.date(),
  sourceInteractionIds: z.array(z.string()),
  text: z.string(),
});

/**
 * Configuration for JsonMemoryStore.
 */
export interface JsonMemoryStoreConfig {
  /** Oldest interactions are dropped beyond this count */
  maxInteractions: number;
  /** Oldest reflections are dropped beyond this count */
  maxReflections: number;
}

const DEFAULT_CONFIG: JsonMemoryStoreConfig = {
  maxInteractions: 1000,
  maxReflections: 200,
};

const INTERACTIONS_KEY = 'interactions';
const REFLECTIONS_KEY = 'reflections';

/**
 * JsonMemoryStore - memory store over key-value storage.
 *
 * Interactions and reflections live in two arrays, oldest first. Relevance is
 * the share of the query's content words found in an item's text; there is
 * no embedding index.
 */
export class JsonMemoryStore implements IMemoryStore {
  private readonly storage: Storage;
  private readonly logger: Logger;
  private readonly config: JsonMemoryStoreConfig;

  private interactions: Interaction[] = [];
  private reflections: ReflectionRecord[] = [];
  private readonly knownIds = new Set<string>();
  private loaded = false;

  constructor(storage: Storage, logger: Logger, config: Partial<JsonMemoryStoreConfig> = {}) {
    this.storage = storage;
    this.logger = logger.child({ component: 'memory-store' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async storeInteraction(interaction: Interaction): Promise<void> {
    await this.ensureLoaded();

    if (this.knownIds.has(interaction.id)) {
      throw new PersistenceFailure(
        'storeInteraction',
        `Interaction ${interaction.id} is already stored`
      );
    }

    // Memory only changes once the write went through
    const next = [...this.interactions, interaction].slice(-this.config.maxInteractions);
    await this.write('storeInteraction', INTERACTIONS_KEY, next);

    const kept = new Set(next.map((i) => i.id));
    for (const old of this.interactions) {
      if (!kept.has(old.id)) this.knownIds.delete(old.id);
    }
    this.knownIds.add(interaction.id);
    this.interactions = next;
  }

  async storeReflection(record: ReflectionRecord): Promise<void> {
    await this.ensureLoaded();

    const next = [...this.reflections, record].slice(-this.config.maxReflections);
    await this.write('storeReflection', REFLECTIONS_KEY, next);
    this.reflections = next;
  }

  async retrieveRelevantContext(query: string, k: number): Promise<ContextItem[]> {
    await this.ensureLoaded();
    if (k <= 0) return [];

    const candidates: ContextItem[] = [];

    for (const interaction of this.interactions) {
      const text = formatExchange(interaction);
      candidates.push({
        source: 'interaction',
        refId: interaction.id,
        text,
        score: queryCoverage(query, text),
        timestamp: interaction.startedAt,
      });
    }

    for (const reflection of this.reflections) {
      candidates.push({
        source: 'reflection',
        refId: reflection.id,
        text: reflection.text,
        score: queryCoverage(query, reflection.text),
        timestamp: reflection.createdAt,
      });
    }

    return candidates
      .filter((item) => item.score > 0)
      .sort((a, b) => b.score - a.score || b.timestamp.getTime() - a.timestamp.getTime())
      .slice(0, k);
  }

  async retrieveLastInteractions(n: number): Promise<Interaction[]> {
    await this.ensureLoaded();
    if (n <= 0) return [];
    return this.interactions.slice(-n).reverse();
  }

  async retrieveReflections(
    kind: ReflectionRecord['kind'],
    n: number
  ): Promise<ReflectionRecord[]> {
    await this.ensureLoaded();
    if (n <= 0) return [];
    return this.reflections
      .filter((r) => r.kind === kind)
      .slice(-n)
      .reverse();
  }

  async flush(): Promise<void> {
    if (isFlushable(this.storage)) {
      await this.storage.flush();
    }
  }

  /**
   * Number of stored interactions.
   */
  async countInteractions(): Promise<number> {
    await this.ensureLoaded();
    return this.interactions.length;
  }

  private async write(operation: string, key: string, records: unknown[]): Promise<void> {
    try {
      await this.storage.save(key, records);
    } catch (error) {
      throw new PersistenceFailure(
        operation,
        error instanceof Error ? error.message : String(error),
        { cause: error }
      );
    }
  }

  private async ensureLoaded(): Promise<void> {
    if (this.loaded) return;

    this.interactions = await this.loadArray(INTERACTIONS_KEY, interactionSchema);
    this.reflections = await this.loadArray(REFLECTIONS_KEY, reflectionSchema);
    for (const interaction of this.interactions) {
      this.knownIds.add(interaction.id);
    }
    this.loaded = true;

    this.logger.debug(
      { interactions: this.interactions.length, reflections: this.reflections.length },
      'Memory loaded'
    );
  }

  /**
   * Load a stored array, keeping valid records and logging the rest.
   */
  private async loadArray<T>(
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T[]> {
    const data = await this.storage.load(key);
    if (data === null) return [];

    if (!Array.isArray(data)) {
      this.logger.error({ key }, 'Stored memory is not an array, starting empty');
      return [];
    }

    const records: T[] = [];
    let invalid = 0;
    for (const raw of data) {
      const parsed = schema.safeParse(raw);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        invalid++;
      }
    }

    if (invalid > 0) {
      this.logger.warn({ key, invalid }, 'Skipped invalid stored records');
    }
    return records;
  }
}

/**
 * Render an interaction as a two-line exchange.
 */
export function formatExchange(interaction: Interaction): string {
  const lines = [`User: ${interaction.message.text}`];
  if (interaction.response) {
    lines.push(`Assistant: ${interaction.response.text}`);
  }
  return lines.join('\n');
}
