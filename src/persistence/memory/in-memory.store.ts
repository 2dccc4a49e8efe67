/**
 * In-Memory Publication Store
 *
 * PublicationStore backed by plain maps, with the same create-if-absent
 * semantics as the SQL store. Used by tests and by local runs without
 * a database.
 */
import type { PublicationStore } from "../../monitor/ports";
import type {
  CaseDetails,
  CaseRef,
  ClassifiedPublication,
  MonitorLogEntry,
  MonitorSubscription,
  NotificationChannelName,
} from "../../shared/types/monitor.types";

interface StoredCase {
  id: number;
  caseNumber: string;
  details: CaseDetails;
  subscriptionIds: Set<number>;
}

export class InMemoryPublicationStore implements PublicationStore {
  private readonly subscriptions = new Map<number, MonitorSubscription>();
  private readonly cases = new Map<string, StoredCase>();
  private readonly publications = new Map<string, ClassifiedPublication>();
  private readonly logs: MonitorLogEntry[] = [];
  private readonly notified = new Map<string, Set<NotificationChannelName>>();
  private nextCaseId = 1;
  /** Number of createPublication calls that actually wrote */
  writes = 0;

  constructor(subscriptions: MonitorSubscription[] = []) {
    subscriptions.forEach((subscription) => this.saveSubscription(subscription));
  }

  saveSubscription(subscription: MonitorSubscription): void {
    this.subscriptions.set(subscription.id, { ...subscription });
  }

  async getSubscription(id: number): Promise<MonitorSubscription | null> {
    const subscription = this.subscriptions.get(id);
    return subscription ? { ...subscription } : null;
  }

  async listActiveSubscriptions(): Promise<MonitorSubscription[]> {
    return [...this.subscriptions.values()]
      .filter((subscription) => subscription.isActive)
      .map((subscription) => ({ ...subscription }));
  }

  async findByIdentityHash(identityHash: string): Promise<boolean> {
    return this.publications.has(identityHash);
  }

  async getOrCreateCase(
    caseNumber: string,
    details: CaseDetails,
    subscriptionId: number
  ): Promise<CaseRef> {
    let stored = this.cases.get(caseNumber);
    const created = !stored;
    if (!stored) {
      stored = { id: this.nextCaseId++, caseNumber, details, subscriptionIds: new Set() };
      this.cases.set(caseNumber, stored);
    }
    stored.subscriptionIds.add(subscriptionId);
    return { id: stored.id, caseNumber, created };
  }

  async createPublication(publication: ClassifiedPublication): Promise<boolean> {
    if (this.publications.has(publication.identityHash)) return false;
    this.publications.set(publication.identityHash, publication);
    this.writes++;
    return true;
  }

  async updateLastChecked(subscriptionId: number, checkedAt: Date): Promise<void> {
    const subscription = this.subscriptions.get(subscriptionId);
    if (subscription) {
      subscription.lastCheckedAt = checkedAt;
    }
  }

  async recordMonitorLog(entry: MonitorLogEntry): Promise<void> {
    this.logs.push({ ...entry });
  }

  async markNotified(identityHash: string, channels: readonly NotificationChannelName[]): Promise<void> {
    if (!this.publications.has(identityHash)) return;
    const flags = this.notified.get(identityHash) ?? new Set<NotificationChannelName>();
    channels.forEach((channel) => flags.add(channel));
    this.notified.set(identityHash, flags);
  }

  getPublications(): ClassifiedPublication[] {
    return [...this.publications.values()];
  }

  getLogs(): MonitorLogEntry[] {
    return [...this.logs];
  }

  getNotifiedChannels(identityHash: string): NotificationChannelName[] {
    return [...(this.notified.get(identityHash) ?? [])];
  }

  getCaseSubscribers(caseNumber: string): number[] {
    return [...(this.cases.get(caseNumber)?.subscriptionIds ?? [])];
  }
}
