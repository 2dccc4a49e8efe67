import { describe, expect, it } from "vitest";
import { PRIORITY_LEVEL } from "../../config/constants";
import { buildNotificationMessage, normalizePhone } from "../message.formatter";
import { publication, subscription } from "../../monitor/__tests__/monitor.fixtures";

describe("buildNotificationMessage", () => {
  const base = {
    subscription: subscription(),
    publication: publication(1),
    summary: "Resumo curto.",
    appUrl: "http://app.test/",
  };

  it("labels the subject with the priority and case number", () => {
    const message = buildNotificationMessage({ ...base, priority: PRIORITY_LEVEL.HIGH });

    expect(message.subject).toBe("[Alta] Nova publicação - Processo 0000001-12.2024.8.26.0100");
  });

  it("links to the app case page when the publication has no source url", () => {
    const message = buildNotificationMessage({ ...base, priority: PRIORITY_LEVEL.LOW });

    expect(message.caseUrl).toBe("http://app.test/processo/0000001-12.2024.8.26.0100/");
  });

  it("prefers the registry link when one was scraped", () => {
    const message = buildNotificationMessage({
      ...base,
      publication: { ...publication(1), sourceUrl: "https://registry.test/p/1" },
      priority: PRIORITY_LEVEL.LOW,
    });

    expect(message.caseUrl).toBe("https://registry.test/p/1");
  });

  it("renders the WhatsApp text with a priority marker", () => {
    const message = buildNotificationMessage({ ...base, priority: PRIORITY_LEVEL.URGENT });

    expect(message.whatsappText).toBe(
      "*🔴 Nova publicação*\n\n" +
        "*Processo:* 0000001-12.2024.8.26.0100\n" +
        "*Data:* 14/03/2024 00:00\n" +
        "*Órgão:* 1ª Vara Cível\n\n" +
        "*Resumo:*\nResumo curto.\n\n" +
        "Acesse os detalhes: http://app.test/processo/0000001-12.2024.8.26.0100/"
    );
  });

  it("uses the medium marker below high priority", () => {
    const message = buildNotificationMessage({ ...base, priority: PRIORITY_LEVEL.MEDIUM });

    expect(message.whatsappText.startsWith("*🟡 Nova publicação*")).toBe(true);
  });

  it("escapes markup in the html body", () => {
    const message = buildNotificationMessage({
      ...base,
      summary: "Prazo <5 dias> & custas",
      priority: PRIORITY_LEVEL.LOW,
    });

    expect(message.html).toContain("<br>Prazo &lt;5 dias&gt; &amp; custas</p>");
  });
});

describe("normalizePhone", () => {
  it("strips plus signs, dashes and spaces", () => {
    expect(normalizePhone("+55 11 99999-0000")).toBe("5511999990000");
  });
});
