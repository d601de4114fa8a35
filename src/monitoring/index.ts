/**
 * Monitoring module exports.
 */

export type {
  MonitorConfig,
  Anomaly,
  MonitorReport,
  IDevelopmentMonitor,
} from './development-monitor.js';
export { DevelopmentMonitor, DisabledDevelopmentMonitor } from './development-monitor.js';
export type {
  ValidationConfig,
  ValidationReport,
  IExternalValidator,
  ProbeResponder,
} from './external-validator.js';
export { ExternalValidator, DisabledExternalValidator } from './external-validator.js';
