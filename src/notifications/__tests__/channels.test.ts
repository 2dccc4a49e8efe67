import { describe, expect, it, vi } from "vitest";
import type { SendMailOptions } from "nodemailer";
import { PRIORITY_LEVEL } from "../../config/constants";
import { EmailChannel } from "../channels/email.channel";
import { WhatsAppChannel } from "../channels/whatsapp.channel";
import { buildNotificationMessage } from "../message.formatter";
import { publication, subscription } from "../../monitor/__tests__/monitor.fixtures";
import { stubHttp } from "../../scraping/__tests__/axios-stub";

const message = buildNotificationMessage({
  subscription: subscription(),
  publication: publication(1),
  priority: PRIORITY_LEVEL.HIGH,
  summary: "Resumo curto.",
  appUrl: "http://app.test",
});

describe("EmailChannel", () => {
  it("sends subject and bodies to the subscriber address", async () => {
    const sendMail = vi.fn(async (_options: SendMailOptions) => ({}));
    const channel = new EmailChannel({ sendMail }, "monitor@example.com");

    await channel.send(subscription(), message);

    expect(sendMail).toHaveBeenCalledWith({
      from: "monitor@example.com",
      to: "maria@example.com",
      subject: message.subject,
      text: message.text,
      html: message.html,
    });
  });

  it("is enabled only with an address and the email opt-in", () => {
    const channel = new EmailChannel({ sendMail: async () => ({}) }, "monitor@example.com");

    expect(channel.isEnabledFor(subscription())).toBe(true);
    expect(channel.isEnabledFor(subscription({ notifyByEmail: false }))).toBe(false);
    expect(channel.isEnabledFor(subscription({ email: null }))).toBe(false);
  });
});

describe("WhatsAppChannel", () => {
  it("posts the normalized phone and text with the bearer token", async () => {
    const { http, calls } = stubHttp([{ status: 200, body: "{}" }]);
    const channel = new WhatsAppChannel({
      apiUrl: "http://whatsapp.test/send",
      apiToken: "test-token",
      http,
    });

    await channel.send(subscription({ notifyByWhatsapp: true }), message);

    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe("http://whatsapp.test/send");
    expect(calls[0].headers["Authorization"]).toBe("Bearer test-token");
    expect(JSON.parse(calls[0].data)).toEqual({
      phone: "5511999990000",
      message: message.whatsappText,
    });
  });

  it("rejects when the gateway does not answer 200", async () => {
    const { http } = stubHttp([{ status: 502, body: "bad gateway" }]);
    const channel = new WhatsAppChannel({
      apiUrl: "http://whatsapp.test/send",
      apiToken: "test-token",
      http,
    });

    await expect(channel.send(subscription(), message)).rejects.toThrow(
      "WhatsApp gateway responded with status 502"
    );
  });

  it("is enabled only with a number and the WhatsApp opt-in", () => {
    const channel = new WhatsAppChannel({ apiUrl: "http://whatsapp.test/send", apiToken: "test-token" });

    expect(channel.isEnabledFor(subscription())).toBe(false);
    expect(channel.isEnabledFor(subscription({ notifyByWhatsapp: true }))).toBe(true);
    expect(channel.isEnabledFor(subscription({ notifyByWhatsapp: true, whatsapp: null }))).toBe(false);
  });
});
