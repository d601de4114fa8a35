import { randomUUID } from 'node:crypto';
import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { Logger } from '../types/logger.js';
import type { InboundMessage } from '../types/interaction.js';
import type { ITransport, SendResult } from '../ports/transport.js';

/**
 * Console transport configuration.
 */
export interface ConsoleTransportConfig {
  /** Sender id given to every line typed on the console (default: "console") */
  senderId: string;
  /** Prefix written before each reply (default: agent name + ": ") */
  replyPrefix: string;
  input: Readable;
  output: Writable;
}

const DEFAULT_CONFIG: ConsoleTransportConfig = {
  senderId: 'console',
  replyPrefix: '',
  input: process.stdin,
  output: process.stdout,
};

/**
 * Console transport.
 *
 * Each non-empty line read from the input becomes one inbound message from a
 * single local sender. Lines queue until the orchestrator polls for them.
 */
export class ConsoleTransport implements ITransport {
  readonly name = 'console';

  private readonly config: ConsoleTransportConfig;
  private readonly logger: Logger;
  private readonly queue: InboundMessage[] = [];
  private readline: Interface | null = null;

  constructor(logger: Logger, config: Partial<ConsoleTransportConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger.child({ component: 'console-transport' });
  }

  /**
   * Begin reading lines from the input.
   */
  start(): Promise<void> {
    if (this.readline) {
      return Promise.resolve();
    }

    this.readline = createInterface({ input: this.config.input, terminal: false });
    this.readline.on('line', (line) => {
      this.enqueue(line);
    });
    this.readline.on('close', () => {
      this.logger.debug('Console input closed');
    });

    this.logger.info({ senderId: this.config.senderId }, 'Console transport started');
    return Promise.resolve();
  }

  /**
   * Queue a line as an inbound message. Blank lines are ignored.
   */
  enqueue(line: string): void {
    const text = line.trim();
    if (text.length === 0) return;

    this.queue.push(
      Object.freeze({
        id: randomUUID(),
        senderId: this.config.senderId,
        text,
        receivedAt: new Date(),
      })
    );
  }

  receive(limit: number): Promise<InboundMessage[]> {
    return Promise.resolve(this.queue.splice(0, Math.max(0, limit)));
  }

  send(senderId: string, text: string): Promise<SendResult> {
    if (senderId !== this.config.senderId) {
      this.logger.warn({ senderId }, 'Unknown console recipient');
      return Promise.resolve({ success: false, error: `Unknown recipient ${senderId}` });
    }

    this.config.output.write(`${this.config.replyPrefix}${text}\n`);
    return Promise.resolve({ success: true });
  }

  close(): Promise<void> {
    if (this.readline) {
      this.readline.close();
      this.readline = null;
      this.logger.info('Console transport closed');
    }
    return Promise.resolve();
  }

  /**
   * Messages waiting to be received.
   */
  pending(): number {
    return this.queue.length;
  }
}
