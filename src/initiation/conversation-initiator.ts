/**
 * Conversation Initiator
 *
 * Lets the agent open a conversation about something it discovered. Bounded
 * by a minimum gap between initiations, a daily cap counted in the configured
 * timezone, and a probability gate.
 */

import { DateTime } from 'luxon';
import type { Logger } from '../types/logger.js';
import type { JobContext } from '../scheduler/periodic-scheduler.js';
import type { DiscoveryBuffer } from '../exploration/discovery-buffer.js';
import { truncate } from '../utils/text.js';

export interface InitiationConfig {
  minGapMs: number;
  /** Chance of initiating once every other condition holds */
  probability: number;
  maxPerDay: number;
  maxLength: number;
  /** IANA zone that decides where a day starts */
  timezone: string;
}

export type InitiationSkipReason =
  | 'no-active-senders'
  | 'too-soon'
  | 'daily-cap'
  | 'not-this-time'
  | 'nothing-to-share'
  | 'send-failed';

export type InitiationResult =
  | { status: 'sent'; recipient: string; text: string }
  | { status: 'skipped'; reason: InitiationSkipReason };

export class ConversationInitiator {
  private readonly buffer: DiscoveryBuffer;
  private readonly interests: () => readonly string[];
  private readonly config: InitiationConfig;
  private readonly logger: Logger;
  private readonly random: () => number;

  private lastInitiatedAt: Date | null = null;
  private dayKey: string | null = null;
  private sentToday = 0;

  constructor(
    buffer: DiscoveryBuffer,
    interests: () => readonly string[],
    config: InitiationConfig,
    logger: Logger,
    random: () => number = Math.random
  ) {
    this.buffer = buffer;
    this.interests = interests;
    this.logger = logger.child({ component: 'initiator' });
    this.random = random;

    if (!DateTime.now().setZone(config.timezone).isValid) {
      this.logger.warn({ timezone: config.timezone }, 'Unknown timezone, counting days in UTC');
      this.config = { ...config, timezone: 'utc' };
    } else {
      this.config = config;
    }
  }

  async maybeInitiate(ctx: JobContext): Promise<InitiationResult> {
    const recipient = ctx.activeSenders[ctx.activeSenders.length - 1];
    if (recipient === undefined) {
      return this.skip('no-active-senders');
    }

    if (
      this.lastInitiatedAt !== null &&
      ctx.now.getTime() - this.lastInitiatedAt.getTime() < this.config.minGapMs
    ) {
      return this.skip('too-soon');
    }

    const today = DateTime.fromJSDate(ctx.now, { zone: this.config.timezone }).toFormat(
      'yyyy-LL-dd'
    );
    if (today !== this.dayKey) {
      this.dayKey = today;
      this.sentToday = 0;
    }
    if (this.sentToday >= this.config.maxPerDay) {
      return this.skip('daily-cap');
    }

    if (this.random() >= this.config.probability) {
      return this.skip('not-this-time');
    }

    const discovery = this.buffer.bestUnshared(this.interests());
    if (discovery === null) {
      return this.skip('nothing-to-share');
    }

    const text = truncate(
      `I came across something about ${discovery.topic}: ${discovery.content}`,
      this.config.maxLength
    );
    const sent = await ctx.send(recipient, text);
    if (!sent) {
      return this.skip('send-failed');
    }

    this.buffer.markShared(discovery.id);
    this.lastInitiatedAt = ctx.now;
    this.sentToday++;
    this.logger.info({ recipient, discoveryId: discovery.id }, 'Conversation initiated');
    return { status: 'sent', recipient, text };
  }

  private skip(reason: InitiationSkipReason): InitiationResult {
    this.logger.debug({ reason }, 'Conversation initiation skipped');
    return { status: 'skipped', reason };
  }
}
