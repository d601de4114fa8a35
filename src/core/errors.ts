/**
 * Agent Error Types
 *
 * Typed errors for the response pipeline, the scheduler and startup.
 * Only FatalStartupFailure is allowed to terminate the process; every other
 * kind is caught at the pipeline or job boundary that produced it.
 */

/**
 * Error codes for classification.
 */
export type AgentErrorCode =
  | 'INPUT_REJECTED'
  | 'GENERATION_FAILED'
  | 'ETHICAL_VIOLATION'
  | 'SAFETY_VIOLATION'
  | 'PERSISTENCE_FAILED'
  | 'SCHEDULER_JOB_FAILED'
  | 'FATAL_STARTUP';

/**
 * Base agent error class.
 */
export class AgentError extends Error {
  constructor(
    message: string,
    public readonly code: AgentErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AgentError';
  }
}

/**
 * Why the safety gate turned a message away.
 */
export type RejectionReason = 'locked_out' | 'rate_limited' | 'too_long' | 'blocked_pattern';

/**
 * Inbound message violated input policy. Non-fatal; answered with the fixed safety reply.
 */
export class InputRejected extends AgentError {
  constructor(
    public readonly senderId: string,
    public readonly reason: RejectionReason,
    detail?: string
  ) {
    super(`Input from ${senderId} rejected: ${detail ?? reason}`, 'INPUT_REJECTED');
    this.name = 'InputRejected';
  }
}

/**
 * Response generator could not produce text (timeout, resource exhaustion, bad reply).
 */
export class GenerationFailure extends AgentError {
  public readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, 'GENERATION_FAILED', options);
    this.name = 'GenerationFailure';
    this.retryable = options?.retryable ?? false;
  }
}

/**
 * Candidate response scored below the ethical pass threshold after its single retry.
 */
export class EthicalViolation extends AgentError {
  constructor(
    public readonly score: number,
    public readonly rationale?: string
  ) {
    super(`Ethical score ${score.toFixed(2)} below pass threshold`, 'ETHICAL_VIOLATION');
    this.name = 'EthicalViolation';
  }
}

/**
 * Output failed the final safety check and must be replaced.
 */
export class SafetyViolation extends AgentError {
  constructor(public readonly detail: string) {
    super(`Unsafe response: ${detail}`, 'SAFETY_VIOLATION');
    this.name = 'SafetyViolation';
  }
}

/**
 * A durable write failed. Logged; never blocks delivery to the user.
 */
export class PersistenceFailure extends AgentError {
  constructor(
    public readonly operation: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation}: ${message}`, 'PERSISTENCE_FAILED', options);
    this.name = 'PersistenceFailure';
  }
}

/**
 * A periodic job threw. Isolated to that job; it stays eligible for its next cycle.
 */
export class SchedulerJobFailure extends AgentError {
  constructor(
    public readonly jobName: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Job ${jobName} failed: ${describeCause(options?.cause)}`,
      'SCHEDULER_JOB_FAILED',
      options
    );
    this.name = 'SchedulerJobFailure';
  }
}

/**
 * A collaborator could not be constructed. Aborts startup.
 */
export class FatalStartupFailure extends AgentError {
  constructor(
    public readonly component: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot start ${component}: ${message}`, 'FATAL_STARTUP', options);
    this.name = 'FatalStartupFailure';
  }
}

/**
 * Render an unknown thrown value for log fields.
 */
export function describeCause(cause: unknown): string {
  if (cause === undefined) return 'unknown error';
  return cause instanceof Error ? cause.message : String(cause);
}
