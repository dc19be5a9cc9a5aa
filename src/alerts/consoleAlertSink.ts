/**
 * Alert sink that writes to the process log.
 */

import type { Logger } from "../logging/logger";
import type { AlertSeverity, AlertSink } from "./types";

export class ConsoleAlertSink implements AlertSink {
  constructor(private readonly logger: Logger) {}

  notify(severity: AlertSeverity, message: string, context?: Record<string, unknown>): void {
    const line = `[ALERT:${severity.toUpperCase()}] ${message}`;
    if (severity === "critical") {
      this.logger.error(line, context);
    } else if (severity === "warning") {
      this.logger.warn(line, context);
    } else {
      this.logger.info(line, context);
    }
  }
}
