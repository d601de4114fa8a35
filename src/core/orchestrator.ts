/**
 * Orchestrator
 *
 * The control loop. Each tick receives a batch from the transport, runs every
 * message through the interaction pipeline one at a time, sends the replies,
 * then lets the scheduler run whatever background jobs are due.
 *
 *   idle → receiving → processing → responding → checking-periodic → idle
 *                                      shutting-down → stopped
 *
 * The orchestrator is the only component that talks to the transport. Every
 * text it sends on behalf of a job passes through the correction mechanism.
 */

import type { Logger } from '../types/logger.js';
import type { InboundMessage } from '../types/interaction.js';
import type { ITransport } from '../ports/transport.js';
import type { IPersonaStore } from '../ports/persona-store.js';
import type { Flushable } from '../storage/storage.js';
import type { InteractionPipeline } from '../pipeline/interaction-pipeline.js';
import type { CorrectionMechanism } from '../safety/correction.js';
import type { PersonaTransform } from '../persona/persona-transform.js';
import type { JobContext, JobRun, PeriodicScheduler } from '../scheduler/periodic-scheduler.js';
import type { OrchestratorState, StatusReporter } from './status.js';
import { summarizeJobRun } from './status.js';
import { withTraceContext, createTraceContext } from './trace-context.js';

export interface OrchestratorConfig {
  pollIntervalMs: number;
  maxBatchSize: number;
  /** Senders allowed to stop the agent with a shutdown command */
  adminSenders: string[];
  shutdownCommands: string[];
  shutdownReply: string;
}

const DEFAULT_CONFIG: OrchestratorConfig = {
  pollIntervalMs: 1000,
  maxBatchSize: 10,
  adminSenders: [],
  shutdownCommands: ['shutdown', 'exit', 'quit'],
  shutdownReply: 'System shutdown initiated.',
};

/** Senders remembered for agent-initiated messages, most recent kept */
const MAX_ACTIVE_SENDERS = 100;

export interface OrchestratorDeps {
  transport: ITransport;
  pipeline: InteractionPipeline;
  scheduler: PeriodicScheduler;
  correction: CorrectionMechanism;
  persona: PersonaTransform;
  personaStore: IPersonaStore;
  /** Flushed in order at shutdown, memory store first */
  flushables: Flushable[];
  status?: StatusReporter;
  logger: Logger;
}

/**
 * What one tick did.
 */
export interface TickReport {
  tick: number;
  received: number;
  /** Messages admitted by the gate and answered by the pipeline */
  processed: number;
  rejected: number;
  /** Messages whose processing threw and got the fallback reply */
  failed: number;
  /** Messages left unanswered because the agent is stopping */
  dropped: number;
  jobRuns: JobRun[];
  shutdownRequested: boolean;
  durationMs: number;
}

type MessageResult = 'processed' | 'rejected' | 'failed' | 'shutdown';

export class Orchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly config: OrchestratorConfig;
  private readonly logger: Logger;

  private state: OrchestratorState = 'idle';
  private running = false;
  private stopRequested = false;
  private tickCount = 0;
  private tickTimeout: ReturnType<typeof setTimeout> | null = null;
  private tickInFlight: Promise<TickReport> | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private lastJobRuns: JobRun[] = [];
  /** Distinct senders in order of their latest message, most recent last */
  private readonly activeSenders: string[] = [];
  private readonly stoppedWaiters: (() => void)[] = [];

  constructor(deps: OrchestratorDeps, config: Partial<OrchestratorConfig> = {}) {
    this.deps = deps;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = deps.logger.child({ component: 'orchestrator' });
  }

  getState(): OrchestratorState {
    return this.state;
  }

  getTickCount(): number {
    return this.tickCount;
  }

  getActiveSenders(): readonly string[] {
    return [...this.activeSenders];
  }

  isStopRequested(): boolean {
    return this.stopRequested;
  }

  /**
   * Start the transport and the tick loop.
   */
  async start(): Promise<void> {
    if (this.running) {
      this.logger.warn('Orchestrator already running');
      return;
    }
    if (this.state === 'stopped' || this.state === 'shutting-down') {
      throw new Error('Orchestrator has been shut down');
    }

    if (this.deps.transport.start) {
      await this.deps.transport.start();
    }

    this.running = true;
    this.logger.info(
      { pollIntervalMs: this.config.pollIntervalMs, transport: this.deps.transport.name },
      'Orchestrator started'
    );
    this.scheduleTick();
  }

  /**
   * Ask the loop to stop. The tick in flight finishes its current stage,
   * then shutdown() completes the stop.
   */
  requestStop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.logger.info('Stop requested');
  }

  /**
   * Resolves once the orchestrator has reached `stopped`.
   */
  whenStopped(): Promise<void> {
    if (this.state === 'stopped') return Promise.resolve();
    return new Promise((resolve) => {
      this.stoppedWaiters.push(resolve);
    });
  }

  /**
   * One pass of the control loop.
   */
  async runTick(now: Date = new Date()): Promise<TickReport> {
    if (this.tickInFlight) {
      return this.tickInFlight;
    }

    this.tickCount++;
    const tick = this.tickCount;
    const traceContext = createTraceContext(`tick_${String(tick)}`, `tick_${String(tick)}`);

    this.tickInFlight = withTraceContext(traceContext, () => this.executeTick(tick, now));
    try {
      return await this.tickInFlight;
    } finally {
      this.tickInFlight = null;
    }
  }

  /**
   * Stop the loop and release everything. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.doShutdown();
    return this.shutdownPromise;
  }

  private scheduleTick(): void {
    if (!this.running) return;

    this.tickTimeout = setTimeout(() => {
      void this.loop();
    }, this.config.pollIntervalMs);
  }

  private async loop(): Promise<void> {
    this.tickTimeout = null;
    if (!this.running) return;

    try {
      await this.runTick();
    } catch (error) {
      this.logger.error(
        { error: error instanceof Error ? error.message : String(error), tick: this.tickCount },
        'Tick failed'
      );
    }

    if (this.stopRequested) {
      await this.shutdown();
      return;
    }
    this.scheduleTick();
  }

  private async executeTick(tick: number, now: Date): Promise<TickReport> {
    const startedAt = Date.now();
    const report: TickReport = {
      tick,
      received: 0,
      processed: 0,
      rejected: 0,
      failed: 0,
      dropped: 0,
      jobRuns: [],
      shutdownRequested: false,
      durationMs: 0,
    };

    this.state = 'receiving';
    const batch = await this.receiveBatch();
    report.received = batch.length;

    let handled = 0;
    for (const message of batch) {
      if (this.stopRequested) break;

      const result = await withTraceContext(createTraceContext(message.id), () =>
        this.handleMessage(message, now)
      );
      handled++;
      if (result === 'shutdown') {
        report.shutdownRequested = true;
        break;
      }
      report[result]++;
    }

    report.dropped = batch.length - handled;
    if (report.dropped > 0) {
      this.logger.warn(
        { dropped: report.dropped, ids: batch.slice(handled).map((m) => m.id) },
        'Stopping, dropped unanswered messages'
      );
    }

    if (!this.stopRequested) {
      this.state = 'checking-periodic';
      report.jobRuns = await this.deps.scheduler.runDue(this.jobContext(now));
      if (report.jobRuns.length > 0) {
        this.lastJobRuns = report.jobRuns;
      }
    }

    this.state = 'idle';
    report.durationMs = Date.now() - startedAt;
    await this.writeStatus(now);

    if (report.received > 0 || report.jobRuns.length > 0) {
      this.logger.debug(
        {
          tick,
          received: report.received,
          processed: report.processed,
          rejected: report.rejected,
          failed: report.failed,
          jobs: report.jobRuns.map((r) => r.job),
          durationMs: report.durationMs,
        },
        'Tick completed'
      );
    }
    return report;
  }

  private async receiveBatch(): Promise<InboundMessage[]> {
    try {
      const batch = await this.deps.transport.receive(this.config.maxBatchSize);
      return batch.slice(0, this.config.maxBatchSize);
    } catch (error) {
      this.logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Failed to receive messages'
      );
      return [];
    }
  }

  private async handleMessage(message: InboundMessage, now: Date): Promise<MessageResult> {
    this.trackSender(message.senderId);

    if (this.isShutdownCommand(message)) {
      this.logger.info({ senderId: message.senderId }, 'Shutdown command received');
      await this.sendChecked(message.senderId, this.config.shutdownReply);
      this.requestStop();
      return 'shutdown';
    }

    this.state = 'processing';
    try {
      const outcome = await this.deps.pipeline.process(message, {
        isCancelled: () => this.stopRequested,
        now,
      });

      this.state = 'responding';
      await this.send(message.senderId, outcome.responseText);
      return outcome.admitted ? 'processed' : 'rejected';
    } catch (error) {
      this.logger.error(
        {
          messageId: message.id,
          error: error instanceof Error ? error.message : String(error),
        },
        'Message processing failed, sending fallback'
      );
      this.state = 'responding';
      await this.sendChecked(message.senderId, this.deps.correction.fallbackResponse);
      return 'failed';
    }
  }

  private isShutdownCommand(message: InboundMessage): boolean {
    if (!this.config.adminSenders.includes(message.senderId)) return false;
    const text = message.text.trim().toLowerCase();
    return this.config.shutdownCommands.some((command) => command.toLowerCase() === text);
  }

  private trackSender(senderId: string): void {
    const index = this.activeSenders.indexOf(senderId);
    if (index !== -1) {
      this.activeSenders.splice(index, 1);
    }
    this.activeSenders.push(senderId);
    if (this.activeSenders.length > MAX_ACTIVE_SENDERS) {
      this.activeSenders.shift();
    }
  }

  private jobContext(now: Date): JobContext {
    return {
      now,
      activeSenders: [...this.activeSenders],
      send: (senderId, text) => this.sendChecked(senderId, text),
      isCancelled: () => this.stopRequested,
    };
  }

  /**
   * Send text that has not been through the pipeline's correction stage.
   */
  private sendChecked(senderId: string, text: string): Promise<boolean> {
    const reviewed = this.deps.correction.review(text);
    return this.send(senderId, reviewed.text);
  }

  private async send(senderId: string, text: string): Promise<boolean> {
    try {
      const result = await this.deps.transport.send(senderId, text);
      if (!result.success) {
        this.logger.warn({ senderId, error: result.error }, 'Transport did not accept message');
      }
      return result.success;
    } catch (error) {
      this.logger.error(
        { senderId, error: error instanceof Error ? error.message : String(error) },
        'Failed to send message'
      );
      return false;
    }
  }

  private async writeStatus(now: Date): Promise<void> {
    if (!this.deps.status) return;
    await this.deps.status.write({
      state: this.state,
      tickCount: this.tickCount,
      processedInteractions: this.deps.pipeline.getCompletedCount(),
      lastJobRuns: this.lastJobRuns.map(summarizeJobRun),
      activeSenders: [...this.activeSenders],
      updatedAt: now.toISOString(),
    });
  }

  private async doShutdown(): Promise<void> {
    this.requestStop();
    this.running = false;
    if (this.tickTimeout) {
      clearTimeout(this.tickTimeout);
      this.tickTimeout = null;
    }

    if (this.tickInFlight) {
      try {
        await this.tickInFlight;
      } catch (error) {
        this.logger.warn(
          { error: error instanceof Error ? error.message : String(error) },
          'Tick in flight failed during shutdown'
        );
      }
    }

    this.state = 'shutting-down';
    this.logger.info({ tickCount: this.tickCount }, 'Shutting down');

    try {
      await this.deps.personaStore.save(this.deps.persona.snapshot());
    } catch (error) {
      this.logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Failed to save persona at shutdown'
      );
    }

    await this.writeStatus(new Date());

    for (const flushable of this.deps.flushables) {
      try {
        await flushable.flush();
      } catch (error) {
        this.logger.error(
          { error: error instanceof Error ? error.message : String(error) },
          'Flush failed at shutdown'
        );
      }
    }

    if (this.deps.transport.close) {
      try {
        await this.deps.transport.close();
      } catch (error) {
        this.logger.error(
          { error: error instanceof Error ? error.message : String(error) },
          'Failed to close transport'
        );
      }
    }

    this.state = 'stopped';
    this.logger.info('Orchestrator stopped');

    for (const resolve of this.stoppedWaiters.splice(0)) {
      resolve();
    }
  }
}
