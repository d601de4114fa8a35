/**
 * Safety Gate
 *
 * First stage of the pipeline. Checks in order: lockout, rate, length,
 * blocked patterns. Every violation after the lockout check raises an alert
 * against the sender; enough alerts inside the window lock the sender out.
 */

import type { Logger } from '../types/logger.js';
import type { InboundMessage } from '../types/interaction.js';
import { InputRejected } from '../core/errors.js';
import { BlockedPatterns } from './blocked-patterns.js';
import { truncate } from '../utils/text.js';
import {
  SecurityTracker,
  type SecurityIncident,
  type SenderSecuritySnapshot,
  type ViolationType,
} from './security-tracker.js';

/**
 * Safety gate configuration.
 */
export interface SafetyGateConfig {
  maxInputLength: number;
  /** Regular expression sources, matched case-insensitively */
  blockedPatterns: string[];
  rateLimitMaxRequests: number;
  rateLimitWindowMs: number;
  alertThreshold: number;
  alertWindowMs: number;
  lockoutDurationMs: number;
  /** Fixed reply for every rejected message */
  safetyMessage: string;
}

export type GateDecision =
  | { allowed: true }
  | { allowed: false; rejection: InputRejected; reply: string };

export interface SecurityReport {
  generatedAt: Date;
  totalIncidents: number;
  incidentsByType: Partial<Record<ViolationType, number>>;
  affectedSenders: number;
  lockouts: number;
  activeLockouts: string[];
  recentIncidents: SecurityIncident[];
}

/**
 * ISafetyGate - input and output policy checks.
 */
export interface ISafetyGate {
  checkInput(message: InboundMessage, now?: Date): GateDecision;

  senderState(senderId: string): SenderSecuritySnapshot;

  report(now?: Date): SecurityReport;
}

const RECENT_INCIDENTS = 10;

export class SafetyGate implements ISafetyGate {
  private readonly config: SafetyGateConfig;
  private readonly logger: Logger;
  private readonly patterns: BlockedPatterns;
  private readonly tracker: SecurityTracker;

  constructor(config: SafetyGateConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ component: 'safety-gate' });
    this.patterns = new BlockedPatterns(config.blockedPatterns, 'safety-gate');
    this.tracker = new SecurityTracker({
      rateLimitWindowMs: config.rateLimitWindowMs,
      alertThreshold: config.alertThreshold,
      alertWindowMs: config.alertWindowMs,
      lockoutDurationMs: config.lockoutDurationMs,
      maxIncidents: 500,
    });
  }

  checkInput(message: InboundMessage, now: Date = new Date()): GateDecision {
    const { senderId, text } = message;

    if (this.tracker.refresh(senderId, now)) {
      this.logger.info({ senderId }, 'Lockout expired, sender reset');
    }
    const pruned = this.tracker.prune(now);
    if (pruned > 0) {
      this.logger.debug({ pruned, tracked: this.tracker.trackedSenders() }, 'Idle senders pruned');
    }

    if (this.tracker.isLockedOut(senderId)) {
      const state = this.tracker.snapshot(senderId);
      this.logger.debug({ senderId, lockedUntil: state.lockedUntil }, 'Rejected locked-out sender');
      return this.reject(new InputRejected(senderId, 'locked_out'));
    }

    const requests = this.tracker.recordRequest(senderId, now);
    if (requests > this.config.rateLimitMaxRequests) {
      return this.violation(
        message,
        'rate_limited',
        `${String(requests)} requests within ${String(this.config.rateLimitWindowMs)}ms`,
        now
      );
    }

    if (text.length > this.config.maxInputLength) {
      return this.violation(
        message,
        'too_long',
        `${String(text.length)} characters exceeds ${String(this.config.maxInputLength)}`,
        now
      );
    }

    const pattern = this.patterns.match(text);
    if (pattern !== null) {
      return this.violation(message, 'blocked_pattern', `matched blocked pattern ${pattern}`, now);
    }

    return { allowed: true };
  }

  senderState(senderId: string): SenderSecuritySnapshot {
    return this.tracker.snapshot(senderId);
  }

  report(now: Date = new Date()): SecurityReport {
    const incidents = this.tracker.getIncidents();
    const incidentsByType: Partial<Record<ViolationType, number>> = {};
    const senders = new Set<string>();

    for (const incident of incidents) {
      incidentsByType[incident.type] = (incidentsByType[incident.type] ?? 0) + 1;
      senders.add(incident.senderId);
    }

    return {
      generatedAt: now,
      totalIncidents: this.tracker.getTotalIncidents(),
      incidentsByType,
      affectedSenders: senders.size,
      lockouts: this.tracker.getLockoutCount(),
      activeLockouts: this.tracker.activeLockouts(now),
      recentIncidents: incidents.slice(-RECENT_INCIDENTS),
    };
  }

  private violation(
    message: InboundMessage,
    type: ViolationType,
    detail: string,
    now: Date
  ): GateDecision {
    const outcome = this.tracker.recordViolation(message.senderId, type, detail, now);

    this.logger.warn(
      {
        senderId: message.senderId,
        type,
        alertCount: outcome.alertCount,
        preview: truncate(message.text, 80),
      },
      'Security alert'
    );
    if (outcome.lockedOut) {
      this.logger.warn(
        { senderId: message.senderId, lockedUntil: outcome.lockedUntil },
        'Sender locked out'
      );
    }

    return this.reject(new InputRejected(message.senderId, type, detail));
  }

  private reject(rejection: InputRejected): GateDecision {
    return { allowed: false, rejection, reply: this.config.safetyMessage };
  }
}

/**
 * Gate used when safety checks are disabled: admits everything, flags nothing.
 */
export class PermissiveSafetyGate implements ISafetyGate {
  checkInput(): GateDecision {
    return { allowed: true };
  }

  senderState(senderId: string): SenderSecuritySnapshot {
    return { senderId, status: 'normal', alertCount: 0, requestCount: 0, lockedUntil: null };
  }

  report(now: Date = new Date()): SecurityReport {
    return {
      generatedAt: now,
      totalIncidents: 0,
      incidentsByType: {},
      affectedSenders: 0,
      lockouts: 0,
      activeLockouts: [],
      recentIncidents: [],
    };
  }
}

export function createSafetyGate(
  config: SafetyGateConfig & { enabled: boolean },
  logger: Logger
): ISafetyGate {
  return config.enabled ? new SafetyGate(config, logger) : new PermissiveSafetyGate();
}
