import { DeliveryFailedError, errorMessage } from "./errors.js";
import { logger as rootLogger, type ContextLogger } from "./logger.js";
import type { EmailMessage, EmailTransport } from "./mailer.js";
import {
  alertEmail,
  missingAddressEmail,
  recordingLinkEmail,
  type AlertKind,
  type StationDetails
} from "./templates.js";
import type { Recipient, Spin } from "./types.js";
import { isValidEmail } from "./utils.js";

export type NotifyStatus = "sent" | "redirected" | "failed";

export type NotifyOutcome = {
  recipient: Recipient;
  status: NotifyStatus;
  attempts: number;
  error?: DeliveryFailedError;
};

export type NotifyReport = {
  outcomes: NotifyOutcome[];
  sent: number;
  failed: number;
};

export type NotifyOptions = {
  airedAt: Date;
  songs?: readonly Spin[];
  timeslotId?: string;
};

export type NotifierOptions = {
  transport: EmailTransport;
  station: StationDetails;
  /** Receives redirected links and alerts. */
  adminAddress?: string;
  ccAddress?: string;
  logger?: ContextLogger;
};

export class Notifier {
  private readonly log: ContextLogger;

  constructor(private readonly options: NotifierOptions) {
    this.log = options.logger ?? rootLogger.withContext({ component: "notifier" });
  }

  /**
   * Emails the link to every recipient independently. A failed send is
   * retried once right away; outcomes are reported for all recipients.
   */
  async notify(
    recipients: readonly Recipient[],
    showName: string,
    remoteUrl: string,
    options: NotifyOptions
  ): Promise<NotifyReport> {
    const log = this.log.withContext({ timeslotId: options.timeslotId, stage: "notify" });
    if (recipients.length === 0) {
      log.warn("notify.skipped", { reason: "no_recipients", show: showName });
      return { outcomes: [], sent: 0, failed: 0 };
    }

    const outcomes: NotifyOutcome[] = [];
    for (const recipient of recipients) {
      const message = this.buildMessage(recipient, showName, remoteUrl, options);
      if (!message) {
        const error = new DeliveryFailedError(`No valid address for ${recipient.name}`, {
          context: { recipient: recipient.email }
        });
        log.error("notify.recipient.failed", { recipient: recipient.email, error: error.message });
        outcomes.push({ recipient, status: "failed", attempts: 0, error });
        continue;
      }

      const redirected = message.to !== recipient.email;
      const result = await this.sendWithResend(message);
      if (result.error) {
        const error = new DeliveryFailedError(`Delivery to ${message.to} failed`, {
          cause: result.error,
          context: { recipient: recipient.email }
        });
        log.error("notify.recipient.failed", {
          recipient: recipient.email,
          attempts: result.attempts,
          error: errorMessage(result.error)
        });
        outcomes.push({ recipient, status: "failed", attempts: result.attempts, error });
        continue;
      }

      log.info(redirected ? "notify.recipient.redirected" : "notify.recipient.sent", {
        recipient: recipient.email,
        to: message.to
      });
      outcomes.push({
        recipient,
        status: redirected ? "redirected" : "sent",
        attempts: result.attempts
      });
    }

    const failed = outcomes.filter((outcome) => outcome.status === "failed").length;
    log.info("notify.done", { show: showName, recipients: outcomes.length, failed });
    return { outcomes, sent: outcomes.length - failed, failed };
  }

  /** Operator alert; never throws. */
  async alert(kind: AlertKind, detail: Record<string, unknown>): Promise<boolean> {
    if (!this.options.adminAddress) {
      return false;
    }
    const message = alertEmail({
      kind,
      to: this.options.adminAddress,
      cc: this.options.ccAddress,
      detail,
      station: this.options.station
    });
    const result = await this.sendWithResend(message);
    if (result.error) {
      this.log.error("alert.failed", { kind, error: errorMessage(result.error) });
      return false;
    }
    this.log.info("alert.sent", { kind, to: message.to });
    return true;
  }

  private buildMessage(
    recipient: Recipient,
    showName: string,
    remoteUrl: string,
    options: NotifyOptions
  ): EmailMessage | null {
    if (isValidEmail(recipient.email)) {
      return recordingLinkEmail({
        hostName: recipient.name,
        to: recipient.email,
        showName,
        airedAt: options.airedAt,
        url: remoteUrl,
        songs: options.songs,
        station: this.options.station
      });
    }
    if (!this.options.adminAddress) {
      return null;
    }
    return missingAddressEmail({
      hostName: recipient.name,
      invalidAddress: recipient.email,
      to: this.options.adminAddress,
      cc: this.options.ccAddress,
      showName,
      url: remoteUrl,
      station: this.options.station
    });
  }

  private async sendWithResend(
    message: EmailMessage
  ): Promise<{ attempts: number; error?: unknown }> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= 2; attempt += 1) {
      try {
        // Attempts are bounded by the transport's own timeouts.
        await this.options.transport.send(message);
        return { attempts: attempt };
      } catch (error) {
        lastError = error;
      }
    }
    return { attempts: 2, error: lastError };
  }
}
