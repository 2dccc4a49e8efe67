import type { MonitorSubscription, NotificationChannelName } from "../../shared/types/monitor.types";
import type { NotificationMessage } from "../message.formatter";

/** One delivery route (email, WhatsApp, ...) */
export interface NotificationChannel {
  readonly name: NotificationChannelName;
  /** Subscriber opted in and has an address for this channel */
  isEnabledFor(subscription: MonitorSubscription): boolean;
  /** Throws on delivery failure */
  send(subscription: MonitorSubscription, message: NotificationMessage): Promise<void>;
}
