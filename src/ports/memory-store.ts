/**
 * Memory Store Port
 *
 * Append-only record of interactions and reflections, with relevance and
 * recency queries for context assembly.
 */

import type { Interaction, ReflectionRecord, ContextItem } from '../types/interaction.js';
import type { Flushable } from '../storage/storage.js';

export interface IMemoryStore extends Flushable {
  /**
   * Record a finalized interaction. Each interaction id is written once.
   * @throws PersistenceFailure
   */
  storeInteraction(interaction: Interaction): Promise<void>;

  /**
   * @throws PersistenceFailure
   */
  storeReflection(record: ReflectionRecord): Promise<void>;

  /**
   * Up to k items ordered by descending relevance to the query.
   */
  retrieveRelevantContext(query: string, k: number): Promise<ContextItem[]>;

  /**
   * The n most recent interactions, most recent first.
   */
  retrieveLastInteractions(n: number): Promise<Interaction[]>;

  /**
   * Reflections of the given kind, most recent first.
   */
  retrieveReflections(kind: ReflectionRecord['kind'], n: number): Promise<ReflectionRecord[]>;
}
