/**
 * Monitor Types
 *
 * Entities the monitor orchestrator reads from and writes to the
 * persistence, scheduler and notification collaborators.
 */
import { MONITOR_LOG_STATUS, PRIORITY_LEVEL } from "../../config/constants";
import type { Publication, StateCode } from "./search.types";

export type PriorityLevel = (typeof PRIORITY_LEVEL)[keyof typeof PRIORITY_LEVEL];

export type MonitorLogStatus = (typeof MONITOR_LOG_STATUS)[keyof typeof MONITOR_LOG_STATUS];

export type NotificationChannelName = "email" | "whatsapp";

/**
 * A monitored attorney. Owned by the persistence layer; the monitor only
 * reads it and writes back lastCheckedAt.
 */
export interface MonitorSubscription {
  id: number;
  attorneyName: string;
  barNumber: string;
  stateCode: StateCode;
  isActive: boolean;
  /** Hours between two successful checks */
  intervalHours: number;
  lastCheckedAt: Date | null;
  email: string | null;
  whatsapp: string | null;
  notifyByEmail: boolean;
  notifyByWhatsapp: boolean;
}

/** Reference to the judicial case a publication belongs to */
export interface CaseRef {
  id: number;
  caseNumber: string;
  created: boolean;
}

export interface CaseDetails {
  tribunalName: string;
  court: string;
}

/** Publication plus the analysis the monitor attaches before persisting */
export interface ClassifiedPublication extends Publication {
  readonly priority: PriorityLevel;
  readonly keywords: readonly string[];
  readonly summary: string;
  readonly caseId: number;
}

export interface MonitorLogEntry {
  subscriptionId: number;
  status: MonitorLogStatus;
  publicationsFound: number;
  publicationsNew: number;
  message: string;
  error?: string | null;
}

/** Payload of a delayed monitor job */
export interface MonitorJob {
  subscriptionId: number;
  /** 0 for a regular cycle, n for the n-th retry */
  attempt: number;
  /** ISO instant the cycle was scheduled for */
  dueAt: string;
  /** Run even when the subscription is not yet due (manual trigger) */
  force?: boolean;
}

export type CycleStatus =
  | "completed"
  | "retry_scheduled"
  | "failed_permanently"
  | "cancelled"
  | "skipped";

export interface CycleOutcome {
  subscriptionId: number;
  status: CycleStatus;
  publicationsFound: number;
  publicationsNew: number;
  /** Delay of the follow-up job, when one was scheduled */
  nextRunInMs?: number;
  error?: string;
}
