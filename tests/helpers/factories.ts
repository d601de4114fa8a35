/**
 * Test factories and in-process stand-ins for the agent's ports.
 */

import { vi } from 'vitest';
import type { Logger } from '../../src/types/logger.js';
import type { InboundMessage } from '../../src/types/interaction.js';
import type { Storage } from '../../src/storage/storage.js';
import type { ITransport, SendResult } from '../../src/ports/transport.js';
import type { IResponseGenerator, GenerateOptions } from '../../src/ports/response-generator.js';
import type { IEvaluator, EvaluationContext, EvaluationScore } from '../../src/ports/evaluator.js';
import type { IDiscoverySource } from '../../src/ports/discovery-source.js';
import type { Discovery } from '../../src/types/discovery.js';
import { GenerationFailure } from '../../src/core/errors.js';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Logger that captures every call. Children share the parent's record.
 */
export class MockLogger implements Logger {
  calls: Record<LogLevel, unknown[][]> = {
    trace: [],
    debug: [],
    info: [],
    warn: [],
    error: [],
    fatal: [],
  };

  trace = vi.fn((objOrMsg: object | string, msg?: string) => this.record('trace', objOrMsg, msg));
  debug = vi.fn((objOrMsg: object | string, msg?: string) => this.record('debug', objOrMsg, msg));
  info = vi.fn((objOrMsg: object | string, msg?: string) => this.record('info', objOrMsg, msg));
  warn = vi.fn((objOrMsg: object | string, msg?: string) => this.record('warn', objOrMsg, msg));
  error = vi.fn((objOrMsg: object | string, msg?: string) => this.record('error', objOrMsg, msg));
  fatal = vi.fn((objOrMsg: object | string, msg?: string) => this.record('fatal', objOrMsg, msg));

  child(): Logger {
    return this;
  }

  /**
   * Messages logged at a level, in order.
   */
  messages(level: LogLevel): string[] {
    return this.calls[level].flatMap((args) => {
      const last = args[args.length - 1];
      return typeof last === 'string' ? [last] : [];
    });
  }

  reset(): void {
    for (const level of Object.keys(this.calls)) {
      if (isLogLevel(level)) this.calls[level] = [];
    }
    vi.clearAllMocks();
  }

  private record(level: LogLevel, objOrMsg: object | string, msg?: string): void {
    this.calls[level].push(msg === undefined ? [objOrMsg] : [objOrMsg, msg]);
  }
}

function isLogLevel(value: string): value is LogLevel {
  return ['trace', 'debug', 'info', 'warn', 'error', 'fatal'].includes(value);
}

export function createMockLogger(): MockLogger {
  return new MockLogger();
}

/**
 * Map-backed storage. Values are cloned on the way in and out.
 */
export class InMemoryStorage implements Storage {
  readonly data = new Map<string, unknown>();
  failSaves = false;
  saveCount = 0;

  load(key: string): Promise<unknown> {
    return Promise.resolve(this.data.has(key) ? structuredClone(this.data.get(key)) : null);
  }

  save(key: string, data: unknown): Promise<void> {
    if (this.failSaves) {
      return Promise.reject(new Error('disk full'));
    }
    this.saveCount++;
    this.data.set(key, structuredClone(data));
    return Promise.resolve();
  }
}

export interface GenerateCall {
  context: string;
  query: string;
  options: GenerateOptions | undefined;
}

export type ScriptedReply = string | Error | ((call: GenerateCall) => string);

/**
 * Generator that answers from a queue, then with its default reply.
 */
export class ScriptedGenerator implements IResponseGenerator {
  readonly calls: GenerateCall[] = [];
  private readonly queue: ScriptedReply[];
  defaultReply: string;

  constructor(replies: ScriptedReply[] = [], defaultReply = 'Happy to help with that.') {
    this.queue = [...replies];
    this.defaultReply = defaultReply;
  }

  enqueue(...replies: ScriptedReply[]): void {
    this.queue.push(...replies);
  }

  generate(context: string, query: string, options?: GenerateOptions): Promise<string> {
    const call = { context, query, options };
    this.calls.push(call);

    const next = this.queue.shift() ?? this.defaultReply;
    if (next instanceof Error) return Promise.reject(next);
    if (typeof next === 'function') return Promise.resolve(next(call));
    return Promise.resolve(next);
  }
}

export function generationTimeout(): GenerationFailure {
  return new GenerationFailure('Request timeout after 50ms', { retryable: true });
}

/**
 * Evaluator that returns queued scores, then its default.
 */
export class ScriptedEvaluator implements IEvaluator {
  readonly name: string;
  readonly calls: { response: string; context: EvaluationContext }[] = [];
  private readonly queue: (EvaluationScore | Error)[];
  private readonly fallback: EvaluationScore;

  constructor(
    scores: (number | EvaluationScore | Error)[] = [],
    fallback: EvaluationScore = { score: 1 },
    name = 'scripted'
  ) {
    this.queue = scores.map((s) => (typeof s === 'number' ? { score: s } : s));
    this.fallback = fallback;
    this.name = name;
  }

  score(response: string, context: EvaluationContext): Promise<EvaluationScore> {
    this.calls.push({ response, context });
    const next = this.queue.shift() ?? this.fallback;
    if (next instanceof Error) return Promise.reject(next);
    return Promise.resolve(next);
  }
}

/**
 * Transport fed by the test and recording everything sent.
 */
export class InMemoryTransport implements ITransport {
  readonly name = 'memory';
  readonly inbox: InboundMessage[] = [];
  readonly sent: { senderId: string; text: string }[] = [];
  failSends = false;
  started = 0;
  closed = 0;

  push(...messages: InboundMessage[]): void {
    this.inbox.push(...messages);
  }

  receive(limit: number): Promise<InboundMessage[]> {
    return Promise.resolve(this.inbox.splice(0, limit));
  }

  send(senderId: string, text: string): Promise<SendResult> {
    if (this.failSends) {
      return Promise.resolve({ success: false, error: 'transport offline' });
    }
    this.sent.push({ senderId, text });
    return Promise.resolve({ success: true });
  }

  start(): Promise<void> {
    this.started++;
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.closed++;
    return Promise.resolve();
  }
}

/**
 * Discovery source returning canned results per topic.
 */
export class StaticDiscoverySource implements IDiscoverySource {
  readonly name = 'static';
  readonly topics: string[] = [];
  private readonly results: Map<string, Discovery[]>;
  failWith: Error | null = null;

  constructor(results: Record<string, Discovery[]> = {}) {
    this.results = new Map(Object.entries(results));
  }

  search(topic: string, limit: number): Promise<Discovery[]> {
    this.topics.push(topic);
    if (this.failWith) return Promise.reject(this.failWith);
    return Promise.resolve((this.results.get(topic) ?? []).slice(0, limit));
  }
}

let messageSeq = 0;

export function createMessage(
  text: string,
  overrides: Partial<InboundMessage> = {}
): InboundMessage {
  messageSeq++;
  return Object.freeze({
    id: `msg-${String(messageSeq)}`,
    senderId: 'user-1',
    text,
    receivedAt: new Date('2024-03-01T10:00:00Z'),
    ...overrides,
  });
}

export function createDiscovery(overrides: Partial<Discovery> = {}): Discovery {
  return {
    id: 'disc-1',
    topic: 'machine learning',
    content: 'A new study on learning rates.',
    source: 'test-feed',
    importance: 0.6,
    discoveredAt: new Date('2024-03-01T09:00:00Z'),
    ...overrides,
  };
}
