/**
 * Notification Dispatcher
 *
 * PublicationNotifier that fans a new publication out to every channel
 * the subscriber opted into. Delivery failures are logged and counted,
 * never thrown: a lost notice must not fail the monitor cycle. The
 * channels that delivered are returned so the store can record them.
 */
import config from "../config";
import type { PublicationNotifier } from "../monitor/ports";
import type {
  MonitorSubscription,
  NotificationChannelName,
  PriorityLevel,
} from "../shared/types/monitor.types";
import type { Publication } from "../shared/types/search.types";
import { toError } from "../shared/errors/scrape.errors";
import { logger } from "../monitoring/logger";
import { metrics } from "../monitoring/metrics.collector";
import { buildNotificationMessage } from "./message.formatter";
import type { NotificationChannel } from "./channels/notification-channel";
import { createEmailChannel } from "./channels/email.channel";
import { createWhatsAppChannel } from "./channels/whatsapp.channel";

export class NotificationDispatcher implements PublicationNotifier {
  constructor(
    private readonly channels: NotificationChannel[],
    private readonly appUrl: string = config.publicAppUrl
  ) {}

  async notify(
    subscription: MonitorSubscription,
    publication: Publication,
    priority: PriorityLevel,
    summary: string
  ): Promise<NotificationChannelName[]> {
    const targets = this.channels.filter((channel) => channel.isEnabledFor(subscription));
    const delivered: NotificationChannelName[] = [];
    if (targets.length === 0) return delivered;

    const message = buildNotificationMessage({
      subscription,
      publication,
      priority,
      summary,
      appUrl: this.appUrl,
    });

    for (const channel of targets) {
      try {
        await channel.send(subscription, message);
        delivered.push(channel.name);
        metrics.increment("notifications_total", { channel: channel.name, status: "sent" });
      } catch (error) {
        metrics.increment("notifications_total", { channel: channel.name, status: "failed" });
        logger.error(
          {
            channel: channel.name,
            subscriptionId: subscription.id,
            caseNumber: publication.caseNumber,
            error: toError(error).message,
          },
          "Failed to deliver notification"
        );
      }
    }

    return delivered;
  }
}

/** Dispatcher over every channel configured in the environment */
export function createNotificationDispatcher(): NotificationDispatcher {
  const channels: NotificationChannel[] = [];
  const email = createEmailChannel();
  const whatsapp = createWhatsAppChannel();
  if (email) channels.push(email);
  if (whatsapp) channels.push(whatsapp);

  logger.info({ channels: channels.map((channel) => channel.name) }, "Notification channels configured");
  return new NotificationDispatcher(channels);
}
