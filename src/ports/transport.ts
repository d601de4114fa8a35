/**
 * Transport Port
 *
 * The message channel between users and the agent. Only the orchestrator
 * talks to it: inbound messages are pulled in batches, responses are pushed
 * one by one.
 */

import type { InboundMessage } from '../types/interaction.js';

/**
 * Result of sending a message.
 */
export interface SendResult {
  success: boolean;
  /** Why the send failed, when it did */
  error?: string;
}

/**
 * ITransport - bidirectional messaging.
 */
export interface ITransport {
  /** Transport identifier (e.g. "console") */
  readonly name: string;

  /**
   * Take up to `limit` pending messages. Must not block beyond a short poll.
   */
  receive(limit: number): Promise<InboundMessage[]>;

  /**
   * Deliver text to a sender.
   */
  send(senderId: string, text: string): Promise<SendResult>;

  /**
   * Start accepting messages. Safe to call more than once.
   */
  start?(): Promise<void>;

  /**
   * Stop accepting messages and release resources.
   */
  close?(): Promise<void>;
}
