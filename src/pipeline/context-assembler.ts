/**
 * Context Assembler
 *
 * Builds the bounded context blob handed to the response generator: the most
 * relevant memories for the query plus the last few exchanges.
 */

import type { ContextItem, Interaction } from '../types/interaction.js';
import type { IMemoryStore } from '../ports/memory-store.js';
import { formatExchange } from '../storage/json-memory-store.js';

export interface ContextConfig {
  /** Relevant items to include */
  topK: number;
  /** Recent interactions to include */
  recentCount: number;
  /** Upper bound on the context text length */
  maxChars: number;
  /** Items scoring below this are left out */
  minRelevance: number;
}

export interface AssembledContext {
  items: ContextItem[];
  /** Recent interactions, oldest first */
  recent: Interaction[];
  text: string;
  empty: boolean;
}

/**
 * Assemble context for a query. Items that are already among the recent
 * interactions are not repeated.
 */
export async function assembleContext(
  memory: IMemoryStore,
  query: string,
  config: ContextConfig
): Promise<AssembledContext> {
  const recent = (await memory.retrieveLastInteractions(config.recentCount)).reverse();
  const recentIds = new Set(recent.map((i) => i.id));

  const candidates = await memory.retrieveRelevantContext(query, config.topK + recent.length);
  const items = candidates
    .filter((item) => item.score >= config.minRelevance)
    .filter((item) => !(item.source === 'interaction' && recentIds.has(item.refId)))
    .slice(0, config.topK);

  const lines: string[] = [];
  if (items.length > 0) {
    lines.push('Relevant memories:');
    lines.push(...items.map((item) => `- ${item.text.replace(/\s*\n\s*/g, ' / ')}`));
  }
  if (recent.length > 0) {
    lines.push('Recent conversation:');
    lines.push(...recent.flatMap((interaction) => formatExchange(interaction).split('\n')));
  }

  return {
    items,
    recent,
    text: fitWithin(lines, config.maxChars),
    empty: items.length === 0 && recent.length === 0,
  };
}

/**
 * Join lines, stopping before the first line that would exceed maxChars.
 */
function fitWithin(lines: string[], maxChars: number): string {
  let text = '';
  for (const line of lines) {
    const next = text.length === 0 ? line : `${text}\n${line}`;
    if (next.length > maxChars) break;
    text = next;
  }
  return text;
}
