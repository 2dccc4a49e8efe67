/**
 * Priority Classifier
 *
 * Scores a publication text by urgent-procedure keywords, then raises the
 * level for short deadlines ("prazo de N dias") and scheduled hearings.
 * Classification only ever raises a level, never lowers it.
 */
import { PRIORITY_KEYWORDS, PRIORITY_LEVEL } from "../config/constants";
import type { PriorityLevel } from "../shared/types/monitor.types";

export interface PriorityAnalysis {
  priority: PriorityLevel;
  /** Matched keywords, followed by deadline/hearing annotations */
  keywords: string[];
}

const DEADLINE_PATTERN = /prazo\s+de\s+(\d+)\s+dias?/;
const HEARING_PATTERN = /audiência.+?(\d{2}\/\d{2}\/\d{4})/;

const URGENT_DEADLINE_DAYS = 5;
const SHORT_DEADLINE_DAYS = 15;

export function classifyPriority(content: string): PriorityAnalysis {
  const text = content.toLowerCase();
  const keywords: string[] = PRIORITY_KEYWORDS.filter((keyword) => text.includes(keyword));

  let priority = levelForKeywordCount(keywords.length);

  const deadline = DEADLINE_PATTERN.exec(text);
  if (deadline) {
    const days = parseInt(deadline[1], 10);
    if (days <= URGENT_DEADLINE_DAYS) {
      priority = raisePriority(priority, PRIORITY_LEVEL.URGENT);
      keywords.push(`Prazo de ${days} dias`);
    } else if (days <= SHORT_DEADLINE_DAYS) {
      priority = raisePriority(priority, PRIORITY_LEVEL.HIGH);
      keywords.push(`Prazo de ${days} dias`);
    }
  }

  const hearing = HEARING_PATTERN.exec(text);
  if (hearing) {
    keywords.push(`Audiência em ${hearing[1]}`);
    priority = raisePriority(priority, PRIORITY_LEVEL.HIGH);
  }

  return { priority, keywords };
}

function levelForKeywordCount(count: number): PriorityLevel {
  if (count >= 3) return PRIORITY_LEVEL.URGENT;
  if (count === 2) return PRIORITY_LEVEL.HIGH;
  if (count === 1) return PRIORITY_LEVEL.MEDIUM;
  return PRIORITY_LEVEL.LOW;
}

export function raisePriority(current: PriorityLevel, floor: PriorityLevel): PriorityLevel {
  return floor > current ? floor : current;
}

const PRIORITY_LABELS: Record<PriorityLevel, string> = {
  [PRIORITY_LEVEL.LOW]: "Baixa",
  [PRIORITY_LEVEL.MEDIUM]: "Média",
  [PRIORITY_LEVEL.HIGH]: "Alta",
  [PRIORITY_LEVEL.URGENT]: "URGENTE",
};

export function priorityLabel(priority: PriorityLevel): string {
  return PRIORITY_LABELS[priority];
}
