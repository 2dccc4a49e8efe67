/**
 * Notification Message Formatter
 *
 * Renders one new publication into the texts each channel sends.
 */
import { PRIORITY_LEVEL } from "../config/constants";
import type { MonitorSubscription, PriorityLevel } from "../shared/types/monitor.types";
import type { Publication } from "../shared/types/search.types";
import { formatDateTime } from "../shared/utils/date";
import { priorityLabel } from "../processing/priority-classifier";

export interface NotificationMessage {
  subject: string;
  /** Plain-text email body */
  text: string;
  html: string;
  /** WhatsApp markdown-flavoured text */
  whatsappText: string;
  caseUrl: string;
}

export interface MessageContext {
  subscription: MonitorSubscription;
  publication: Publication;
  priority: PriorityLevel;
  summary: string;
  /** Base URL of the web app, for the detail link */
  appUrl: string;
}

export function buildNotificationMessage(context: MessageContext): NotificationMessage {
  const { subscription, publication, priority, summary } = context;
  const label = priorityLabel(priority);
  const publishedAt = formatDateTime(publication.publishedAt);
  const caseUrl =
    publication.sourceUrl ??
    `${context.appUrl.replace(/\/+$/, "")}/processo/${encodeURIComponent(publication.caseNumber)}/`;

  const subject = `[${label}] Nova publicação - Processo ${publication.caseNumber}`;

  const text = [
    `Olá, ${subscription.attorneyName}.`,
    "",
    `Uma nova publicação foi encontrada para a OAB ${subscription.barNumber}/${subscription.stateCode}.`,
    "",
    `Processo: ${publication.caseNumber}`,
    `Tribunal: ${publication.tribunalName}`,
    `Órgão: ${publication.court}`,
    `Data: ${publishedAt}`,
    `Prioridade: ${label}`,
    "",
    "Resumo:",
    summary,
    "",
    `Acesse os detalhes: ${caseUrl}`,
  ].join("\n");

  const html = [
    `<p>Olá, ${escapeHtml(subscription.attorneyName)}.</p>`,
    `<p>Uma nova publicação foi encontrada para a OAB ${escapeHtml(subscription.barNumber)}/${subscription.stateCode}.</p>`,
    "<ul>",
    `<li><strong>Processo:</strong> ${escapeHtml(publication.caseNumber)}</li>`,
    `<li><strong>Tribunal:</strong> ${escapeHtml(publication.tribunalName)}</li>`,
    `<li><strong>Órgão:</strong> ${escapeHtml(publication.court)}</li>`,
    `<li><strong>Data:</strong> ${publishedAt}</li>`,
    `<li><strong>Prioridade:</strong> ${label}</li>`,
    "</ul>",
    `<p><strong>Resumo:</strong><br>${escapeHtml(summary)}</p>`,
    `<p><a href="${escapeHtml(caseUrl)}">Acesse os detalhes</a></p>`,
  ].join("\n");

  const whatsappText =
    `*${priorityEmoji(priority)} Nova publicação*\n\n` +
    `*Processo:* ${publication.caseNumber}\n` +
    `*Data:* ${publishedAt}\n` +
    `*Órgão:* ${publication.court}\n\n` +
    `*Resumo:*\n${summary}\n\n` +
    `Acesse os detalhes: ${caseUrl}`;

  return { subject, text, html, whatsappText, caseUrl };
}

function priorityEmoji(priority: PriorityLevel): string {
  if (priority === PRIORITY_LEVEL.URGENT) return "🔴";
  if (priority === PRIORITY_LEVEL.HIGH) return "🟠";
  return "🟡";
}

/** Digits only, as the WhatsApp gateway expects */
export function normalizePhone(phone: string): string {
  return phone.replace(/[+\-\s]/g, "");
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
