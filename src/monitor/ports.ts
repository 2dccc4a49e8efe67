/**
 * Monitor Ports
 *
 * Collaborators the orchestrator depends on. Concrete adapters live in
 * persistence/ (store), queue/ (scheduler) and notifications/ (notifier).
 */
import type {
  CaseDetails,
  CaseRef,
  ClassifiedPublication,
  MonitorJob,
  MonitorLogEntry,
  MonitorSubscription,
  NotificationChannelName,
  PriorityLevel,
} from "../shared/types/monitor.types";
import type { Publication, SearchOptions, SearchResult } from "../shared/types/search.types";

export interface PublicationStore {
  getSubscription(id: number): Promise<MonitorSubscription | null>;
  listActiveSubscriptions(): Promise<MonitorSubscription[]>;
  /** True when a publication with this identity is already stored */
  findByIdentityHash(identityHash: string): Promise<boolean>;
  /** Finds the case by number (creating it if needed) and links the subscription to it */
  getOrCreateCase(
    caseNumber: string,
    details: CaseDetails,
    subscriptionId: number
  ): Promise<CaseRef>;
  /**
   * Create-if-absent on the identity hash.
   * Returns false when another writer stored the same identity first.
   */
  createPublication(publication: ClassifiedPublication): Promise<boolean>;
  updateLastChecked(subscriptionId: number, checkedAt: Date): Promise<void>;
  recordMonitorLog(entry: MonitorLogEntry): Promise<void>;
  /** Flags the stored publication as delivered on each of `channels` */
  markNotified(identityHash: string, channels: readonly NotificationChannelName[]): Promise<void>;
}

export interface MonitorScheduler {
  /** Run `job` once, no earlier than `delayMs` from now */
  scheduleAfter(delayMs: number, job: MonitorJob): Promise<void>;
}

export interface PublicationNotifier {
  notify(
    subscription: MonitorSubscription,
    publication: Publication,
    priority: PriorityLevel,
    summary: string
  ): Promise<NotificationChannelName[]>;
}

export interface PublicationSearcher {
  searchByPeriod(
    barNumber: string,
    stateCode: string,
    startDate?: Date,
    endDate?: Date,
    options?: SearchOptions
  ): Promise<SearchResult>;
}
