/**
 * WhatsApp Channel
 *
 * Posts the publication notice to an HTTP WhatsApp gateway
 * ({ phone, message } JSON, bearer token).
 */
import axios, { type AxiosInstance } from "axios";
import config from "../../config";
import type { MonitorSubscription } from "../../shared/types/monitor.types";
import { type NotificationMessage, normalizePhone } from "../message.formatter";
import type { NotificationChannel } from "./notification-channel";
import { logger } from "../../monitoring/logger";

export interface WhatsAppChannelOptions {
  apiUrl: string;
  apiToken: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

export class WhatsAppChannel implements NotificationChannel {
  readonly name = "whatsapp";
  private readonly http: AxiosInstance;

  constructor(private readonly options: WhatsAppChannelOptions) {
    this.http = options.http ?? axios.create();
  }

  isEnabledFor(subscription: MonitorSubscription): boolean {
    return subscription.notifyByWhatsapp && Boolean(subscription.whatsapp);
  }

  async send(subscription: MonitorSubscription, message: NotificationMessage): Promise<void> {
    if (!subscription.whatsapp) return;

    const phone = normalizePhone(subscription.whatsapp);
    const response = await this.http.post(
      this.options.apiUrl,
      { phone, message: message.whatsappText },
      {
        headers: {
          Authorization: `Bearer ${this.options.apiToken}`,
          "Content-Type": "application/json",
        },
        timeout: this.options.timeoutMs ?? 15000,
        validateStatus: () => true,
      }
    );

    if (response.status !== 200) {
      throw new Error(`WhatsApp gateway responded with status ${response.status}`);
    }

    logger.info({ subscriptionId: subscription.id, phone }, "WhatsApp notification sent");
  }
}

/** WhatsApp channel over the configured gateway, or null when not configured */
export function createWhatsAppChannel(): WhatsAppChannel | null {
  if (!config.whatsappApiUrl) return null;
  return new WhatsAppChannel({ apiUrl: config.whatsappApiUrl, apiToken: config.whatsappApiToken });
}
