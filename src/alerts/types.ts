/**
 * Alert sink interface.
 *
 * Alerts are reserved for conditions that need a human: naked exposure
 * and kill-switch trips. `notify` returns immediately; delivery happens
 * in the background and failures are logged by the sink.
 */

export type AlertSeverity = "info" | "warning" | "critical";

export interface AlertSink {
  notify(severity: AlertSeverity, message: string, context?: Record<string, unknown>): void;
}
