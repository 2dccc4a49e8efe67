/**
 * Email Channel
 *
 * Sends the publication notice through SMTP with nodemailer.
 */
import { type SendMailOptions, createTransport } from "nodemailer";
import config from "../../config";
import type { MonitorSubscription } from "../../shared/types/monitor.types";
import type { NotificationMessage } from "../message.formatter";
import type { NotificationChannel } from "./notification-channel";
import { logger } from "../../monitoring/logger";

/** The part of a nodemailer transporter this channel uses */
export interface MailSender {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

export class EmailChannel implements NotificationChannel {
  readonly name = "email";

  constructor(
    private readonly sender: MailSender,
    private readonly from: string = config.emailFrom
  ) {}

  isEnabledFor(subscription: MonitorSubscription): boolean {
    return subscription.notifyByEmail && Boolean(subscription.email);
  }

  async send(subscription: MonitorSubscription, message: NotificationMessage): Promise<void> {
    if (!subscription.email) return;

    await this.sender.sendMail({
      from: this.from,
      to: subscription.email,
      subject: message.subject,
      text: message.text,
      html: message.html,
    });

    logger.info({ subscriptionId: subscription.id, to: subscription.email }, "Notification email sent");
  }
}

/**
 * Email channel over the configured SMTP server, or null when SMTP is
 * not configured.
 */
export function createEmailChannel(): EmailChannel | null {
  if (!config.smtpHost) return null;

  const transporter = createTransport({
    host: config.smtpHost,
    port: config.smtpPort,
    secure: config.smtpSecure,
    auth: config.smtpUser ? { user: config.smtpUser, pass: config.smtpPassword } : undefined,
  });
  return new EmailChannel(transporter, config.emailFrom);
}
