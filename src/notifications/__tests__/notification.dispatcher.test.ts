import { describe, expect, it, vi } from "vitest";
import { PRIORITY_LEVEL } from "../../config/constants";
import type { MonitorSubscription, NotificationChannelName } from "../../shared/types/monitor.types";
import type { NotificationChannel } from "../channels/notification-channel";
import type { NotificationMessage } from "../message.formatter";
import { NotificationDispatcher } from "../notification.dispatcher";
import { metrics } from "../../monitoring/metrics.collector";
import { publication, subscription } from "../../monitor/__tests__/monitor.fixtures";

type Send = (subscription: MonitorSubscription, message: NotificationMessage) => Promise<void>;

function channel(name: NotificationChannelName, enabled: boolean, send: Send) {
  const spy = vi.fn<Send>(send);
  const value: NotificationChannel = { name, isEnabledFor: () => enabled, send: spy };
  return { channel: value, send: spy };
}

describe("NotificationDispatcher", () => {
  it("sends through every enabled channel only", async () => {
    const email = channel("email", true, async () => undefined);
    const whatsapp = channel("whatsapp", false, async () => undefined);
    const dispatcher = new NotificationDispatcher([email.channel, whatsapp.channel], "http://app.test");

    const delivered = await dispatcher.notify(
      subscription(),
      publication(1),
      PRIORITY_LEVEL.HIGH,
      "Resumo curto."
    );

    expect(delivered).toEqual(["email"]);
    expect(email.send).toHaveBeenCalledTimes(1);
    expect(email.send.mock.calls[0][1].subject).toBe(
      "[Alta] Nova publicação - Processo 0000001-12.2024.8.26.0100"
    );
    expect(whatsapp.send).not.toHaveBeenCalled();
  });

  it("keeps going and resolves when a channel fails", async () => {
    const failing = channel("email", true, async () => {
      throw new Error("SMTP unavailable");
    });
    const working = channel("whatsapp", true, async () => undefined);
    const dispatcher = new NotificationDispatcher([failing.channel, working.channel], "http://app.test");
    const failedBefore = metrics.get("notifications_total", { channel: "email", status: "failed" });
    const sentBefore = metrics.get("notifications_total", { channel: "whatsapp", status: "sent" });

    await expect(
      dispatcher.notify(subscription(), publication(2), PRIORITY_LEVEL.LOW, "Resumo curto.")
    ).resolves.toEqual(["whatsapp"]);

    expect(working.send).toHaveBeenCalledTimes(1);
    expect(metrics.get("notifications_total", { channel: "email", status: "failed" })).toBe(failedBefore + 1);
    expect(metrics.get("notifications_total", { channel: "whatsapp", status: "sent" })).toBe(sentBefore + 1);
  });

  it("returns no channels when the subscriber opted out of all of them", async () => {
    const email = channel("email", false, async () => undefined);
    const dispatcher = new NotificationDispatcher([email.channel], "http://app.test");

    await expect(
      dispatcher.notify(subscription(), publication(3), PRIORITY_LEVEL.LOW, "Resumo curto.")
    ).resolves.toEqual([]);
    expect(email.send).not.toHaveBeenCalled();
  });
});
