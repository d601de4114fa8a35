/**
 * Safety module exports.
 */

export type {
  SecurityStatus,
  ViolationType,
  SecurityIncident,
  SenderSecuritySnapshot,
} from './security-tracker.js';
export { SecurityTracker } from './security-tracker.js';
export type { SafetyGateConfig, GateDecision, SecurityReport, ISafetyGate } from './safety-gate.js';
export { SafetyGate, PermissiveSafetyGate, createSafetyGate } from './safety-gate.js';
export type {
  CorrectionConfig,
  CorrectionResult,
  CorrectionRecord,
  ReviewOptions,
} from './correction.js';
export { CorrectionMechanism } from './correction.js';
export { BlockedPatterns } from './blocked-patterns.js';
export type { ChangeRecord, ChangeStatus } from './change-ledger.js';
export { ChangeLedger } from './change-ledger.js';
