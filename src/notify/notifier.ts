import { logger } from "../config/logger.js";

export type Severity = "info" | "warning" | "error" | "critical";

/** Delivers operator notifications; formatting of the transport is its own business. */
export interface Notifier {
  notify(severity: Severity, subject: string, body: string): Promise<void>;
}

/** Writes notifications to the log. Always configured. */
export class LogNotifier implements Notifier {
  async notify(severity: Severity, subject: string, body: string): Promise<void> {
    const meta = { notification: true, body };
    switch (severity) {
      case "info":
        logger.info(subject, meta);
        break;
      case "warning":
        logger.warn(subject, meta);
        break;
      default:
        logger.error(subject, { ...meta, severity });
    }
  }
}

/**
 * Fans a notification out to every channel. A channel that fails is logged
 * and skipped; delivery problems never replace the error being reported.
 */
export class CompositeNotifier implements Notifier {
  private readonly channels: Notifier[];

  constructor(channels: Notifier[]) {
    this.channels = channels;
  }

  async notify(severity: Severity, subject: string, body: string): Promise<void> {
    for (const channel of this.channels) {
      try {
        await channel.notify(severity, subject, body);
      } catch (err) {
        logger.error(`Notification delivery failed: ${subject}`, {
          channel: channel.constructor.name,
          err: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}
