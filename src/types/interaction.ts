/**
 * Message and interaction records flowing through the response pipeline.
 */

/**
 * A message received from the transport. Frozen once created.
 */
export interface InboundMessage {
  readonly id: string;
  readonly senderId: string;
  readonly text: string;
  readonly receivedAt: Date;
}

/**
 * How the final response text came to be.
 * - generated: model output that survived every stage
 * - fallback: deterministic text used after a generation failure or cancellation
 * - safety: fixed text substituted by the correction mechanism
 */
export type ResponseKind = 'generated' | 'fallback' | 'safety';

export interface OutboundResponse {
  text: string;
  kind: ResponseKind;
}

/**
 * Steps recorded in an interaction's trace, in the order they happened.
 */
export type PipelineStep =
  | 'gate-pass'
  | 'gate-reject'
  | 'context-empty'
  | 'context-assembled'
  | 'generated'
  | 'generation-failed'
  | 'persona-applied'
  | 'ethics-pass'
  | 'ethics-retry'
  | 'ethics-fail'
  | 'correction-pass'
  | 'correction-replaced'
  | 'cancelled';

/**
 * One pass of a message through the pipeline.
 * Written once to the memory store and never mutated afterwards.
 */
export interface Interaction {
  id: string;
  message: InboundMessage;
  response: OutboundResponse | null;
  trace: PipelineStep[];
  /** Final ethics score of the delivered candidate, if one was scored */
  ethicsScore: number | null;
  startedAt: Date;
  completedAt: Date | null;
}

export type ReflectionKind = 'interaction' | 'ethical';

/**
 * Generated self-analysis, stored separately from interactions.
 */
export interface ReflectionRecord {
  id: string;
  kind: ReflectionKind;
  createdAt: Date;
  sourceInteractionIds: string[];
  text: string;
}

/**
 * A memory item returned by relevance search.
 */
export interface ContextItem {
  source: 'interaction' | 'reflection';
  /** Id of the interaction or reflection this item came from */
  refId: string;
  text: string;
  /** Relevance to the query, 0-1 */
  score: number;
  timestamp: Date;
}
