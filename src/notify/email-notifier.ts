/**
 * Email notifications for backup operators, sent through Resend.
 */

import { Resend } from "resend";
import { logger } from "../config/logger.js";
import type { Notifier, Severity } from "./notifier.js";

export interface EmailNotifierConfig {
  apiKey: string;
  from: string;
  to: string;
  /** Prefixed to every subject so several clusters can share one inbox. */
  subjectPrefix?: string;
}

/** Minimal slice of the Resend SDK used here (lets tests pass a fake). */
export interface EmailSender {
  emails: {
    send(payload: { from: string; to: string; subject: string; text: string; html: string }): Promise<{
      data: { id: string } | null;
      error: { message: string } | null;
    }>;
  };
}

export class EmailNotifier implements Notifier {
  private readonly sender: EmailSender;
  private readonly config: EmailNotifierConfig;

  constructor(config: EmailNotifierConfig, sender?: EmailSender) {
    this.config = config;
    this.sender = sender ?? new Resend(config.apiKey);
  }

  async notify(severity: Severity, subject: string, body: string): Promise<void> {
    const fullSubject = `${this.config.subjectPrefix ?? "[cluster-backup]"} ${severity.toUpperCase()}: ${subject}`;
    const { data, error } = await this.sender.emails.send({
      from: this.config.from,
      to: this.config.to,
      subject: fullSubject,
      text: body,
      html: `<pre>${escapeHtml(body)}</pre>`,
    });

    if (error) {
      throw new Error(`Failed to send notification email: ${error.message}`);
    }

    logger.info("Notification email sent", { emailId: data?.id ?? "", to: this.config.to, subject: fullSubject });
  }
}

/** Escape HTML special characters so log text renders verbatim. */
export function escapeHtml(str: string): string {
  const map: Record<string, string> = {
    "&": "&amp;",
    "<": "&lt;",
    ">": "&gt;",
    '"': "&quot;",
    "'": "&#39;",
  };
  return str.replace(/[&<>"']/g, (char) => map[char] || char);
}
