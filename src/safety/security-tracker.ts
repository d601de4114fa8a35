/**
 * Security Tracker
 *
 * Per-sender security state: Normal → Warned → LockedOut → Normal.
 * Owned by the safety gate, which is its only writer.
 */

import type { RejectionReason } from '../core/errors.js';

export type SecurityStatus = 'normal' | 'warned' | 'locked_out';

/**
 * A violation that counted towards a sender's alerts.
 */
export type ViolationType = Exclude<RejectionReason, 'locked_out'>;

export interface SecurityIncident {
  senderId: string;
  type: ViolationType;
  detail: string;
  at: Date;
}

/**
 * Read-only view of one sender's state.
 */
export interface SenderSecuritySnapshot {
  senderId: string;
  status: SecurityStatus;
  alertCount: number;
  requestCount: number;
  lockedUntil: Date | null;
}

export interface SecurityTrackerConfig {
  rateLimitWindowMs: number;
  alertThreshold: number;
  alertWindowMs: number;
  lockoutDurationMs: number;
  /** Incidents kept for the security report */
  maxIncidents: number;
}

interface SenderState {
  status: SecurityStatus;
  requestTimes: number[];
  alertTimes: number[];
  lockedUntil: number | null;
}

function freshState(): SenderState {
  return { status: 'normal', requestTimes: [], alertTimes: [], lockedUntil: null };
}

/**
 * What happened when a violation was recorded.
 */
export interface ViolationOutcome {
  alertCount: number;
  lockedOut: boolean;
  lockedUntil: Date | null;
}

export class SecurityTracker {
  private readonly config: SecurityTrackerConfig;
  private readonly senders = new Map<string, SenderState>();
  private readonly incidents: SecurityIncident[] = [];
  private totalIncidents = 0;
  private lockoutCount = 0;
  private lastPrunedAt: number | null = null;

  constructor(config: SecurityTrackerConfig) {
    this.config = config;
  }

  /**
   * Bring a sender's state up to `now`: lift an expired lockout (resetting
   * every counter) and age out old requests and alerts.
   * @returns true when a lockout was lifted
   */
  refresh(senderId: string, now: Date): boolean {
    const state = this.senders.get(senderId);
    if (!state) return false;
    const t = now.getTime();

    if (state.status === 'locked_out') {
      if (state.lockedUntil !== null && t >= state.lockedUntil) {
        this.senders.set(senderId, freshState());
        return true;
      }
      return false;
    }

    state.requestTimes = state.requestTimes.filter((r) => t - r < this.config.rateLimitWindowMs);
    state.alertTimes = state.alertTimes.filter((a) => t - a < this.config.alertWindowMs);
    if (state.status === 'warned' && state.alertTimes.length === 0) {
      state.status = 'normal';
    }
    return false;
  }

  /**
   * Forget senders with nothing left to track: every request and alert aged
   * out, and no lockout still running. Runs at most once per rate or alert
   * window, whichever is longer.
   * @returns How many senders were forgotten
   */
  prune(now: Date): number {
    const t = now.getTime();
    const interval = Math.max(this.config.rateLimitWindowMs, this.config.alertWindowMs);
    if (this.lastPrunedAt !== null && t - this.lastPrunedAt < interval) return 0;
    this.lastPrunedAt = t;

    let removed = 0;
    for (const senderId of [...this.senders.keys()]) {
      this.refresh(senderId, now);
      const state = this.senders.get(senderId);
      if (
        state?.status === 'normal' &&
        state.requestTimes.length === 0 &&
        state.alertTimes.length === 0
      ) {
        this.senders.delete(senderId);
        removed++;
      }
    }
    return removed;
  }

  trackedSenders(): number {
    return this.senders.size;
  }

  isLockedOut(senderId: string): boolean {
    return this.senders.get(senderId)?.status === 'locked_out';
  }

  /**
   * Record a request and return how many fall within the rate window.
   */
  recordRequest(senderId: string, now: Date): number {
    const state = this.stateFor(senderId);
    state.requestTimes.push(now.getTime());
    return state.requestTimes.length;
  }

  /**
   * Count a violation against a sender. Reaching the alert threshold locks them out.
   */
  recordViolation(
    senderId: string,
    type: ViolationType,
    detail: string,
    now: Date
  ): ViolationOutcome {
    const state = this.stateFor(senderId);
    const t = now.getTime();

    this.incidents.push({ senderId, type, detail, at: now });
    if (this.incidents.length > this.config.maxIncidents) {
      this.incidents.shift();
    }
    this.totalIncidents++;

    state.alertTimes.push(t);
    if (state.alertTimes.length >= this.config.alertThreshold) {
      state.status = 'locked_out';
      state.lockedUntil = t + this.config.lockoutDurationMs;
      this.lockoutCount++;
    } else {
      state.status = 'warned';
    }

    return {
      alertCount: state.alertTimes.length,
      lockedOut: state.status === 'locked_out',
      lockedUntil: state.lockedUntil === null ? null : new Date(state.lockedUntil),
    };
  }

  snapshot(senderId: string): SenderSecuritySnapshot {
    const state = this.senders.get(senderId) ?? freshState();
    return {
      senderId,
      status: state.status,
      alertCount: state.alertTimes.length,
      requestCount: state.requestTimes.length,
      lockedUntil: state.lockedUntil === null ? null : new Date(state.lockedUntil),
    };
  }

  getIncidents(): readonly SecurityIncident[] {
    return this.incidents;
  }

  getTotalIncidents(): number {
    return this.totalIncidents;
  }

  getLockoutCount(): number {
    return this.lockoutCount;
  }

  /**
   * Senders whose lockout has not expired at `now`.
   */
  activeLockouts(now: Date): string[] {
    const locked: string[] = [];
    for (const [senderId, state] of this.senders) {
      if (
        state.status === 'locked_out' &&
        state.lockedUntil !== null &&
        now.getTime() < state.lockedUntil
      ) {
        locked.push(senderId);
      }
    }
    return locked;
  }

  private stateFor(senderId: string): SenderState {
    let state = this.senders.get(senderId);
    if (!state) {
      state = freshState();
      this.senders.set(senderId, state);
    }
    return state;
  }
}
