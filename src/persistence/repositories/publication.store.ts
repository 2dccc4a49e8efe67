/**
 * Sequelize Publication Store
 *
 * PublicationStore over the MySQL models. Publications are written
 * create-if-absent: the unique index on identity_hash rejects the loser
 * of a concurrent insert, which is reported as "already stored".
 */
import { UniqueConstraintError } from "sequelize";
import type { PublicationStore } from "../../monitor/ports";
import type {
  CaseDetails,
  CaseRef,
  ClassifiedPublication,
  MonitorLogEntry,
  MonitorSubscription,
  NotificationChannelName,
} from "../../shared/types/monitor.types";
import {
  AttorneySubscription,
  CaseSubscription,
  JudicialCase,
  MonitoredPublication,
  MonitorLog,
} from "../db/models";
import { logger } from "../../monitoring/logger";

export class SequelizePublicationStore implements PublicationStore {
  async getSubscription(id: number): Promise<MonitorSubscription | null> {
    const row = await AttorneySubscription.findByPk(id);
    return row ? toSubscription(row) : null;
  }

  async listActiveSubscriptions(): Promise<MonitorSubscription[]> {
    const rows = await AttorneySubscription.findAll({
      where: { isActive: true },
      order: [["id", "ASC"]],
    });
    return rows.map(toSubscription);
  }

  async findByIdentityHash(identityHash: string): Promise<boolean> {
    const count = await MonitoredPublication.count({ where: { identityHash } });
    return count > 0;
  }

  async getOrCreateCase(
    caseNumber: string,
    details: CaseDetails,
    subscriptionId: number
  ): Promise<CaseRef> {
    const [judicialCase, created] = await JudicialCase.findOrCreate({
      where: { caseNumber },
      defaults: { caseNumber, tribunalName: details.tribunalName, court: details.court },
    });

    await CaseSubscription.findOrCreate({
      where: { caseId: judicialCase.id, subscriptionId },
      defaults: { caseId: judicialCase.id, subscriptionId },
    });

    if (created) {
      logger.info({ caseNumber, caseId: judicialCase.id }, "Judicial case created");
    }

    return { id: judicialCase.id, caseNumber, created };
  }

  async createPublication(publication: ClassifiedPublication): Promise<boolean> {
    try {
      await MonitoredPublication.create({
        caseId: publication.caseId,
        identityHash: publication.identityHash,
        publishedAt: publication.publishedAt,
        content: publication.content,
        tribunalName: publication.tribunalName,
        court: publication.court,
        notebook: publication.notebook ?? null,
        sourceUrl: publication.sourceUrl ?? null,
        priority: publication.priority,
        keywords: [...publication.keywords],
        summary: publication.summary,
      });
      return true;
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        return false;
      }
      throw error;
    }
  }

  async updateLastChecked(subscriptionId: number, checkedAt: Date): Promise<void> {
    await AttorneySubscription.update({ lastCheckedAt: checkedAt }, { where: { id: subscriptionId } });
  }

  async recordMonitorLog(entry: MonitorLogEntry): Promise<void> {
    await MonitorLog.create({
      subscriptionId: entry.subscriptionId,
      status: entry.status,
      publicationsFound: entry.publicationsFound,
      publicationsNew: entry.publicationsNew,
      message: entry.message,
      error: entry.error ?? null,
    });
  }

  async markNotified(identityHash: string, channels: readonly NotificationChannelName[]): Promise<void> {
    const flags: { notifiedByEmail?: boolean; notifiedByWhatsapp?: boolean } = {};
    if (channels.includes("email")) flags.notifiedByEmail = true;
    if (channels.includes("whatsapp")) flags.notifiedByWhatsapp = true;
    if (Object.keys(flags).length === 0) return;

    await MonitoredPublication.update(flags, { where: { identityHash } });
  }
}

function toSubscription(row: AttorneySubscription): MonitorSubscription {
  return {
    id: row.id,
    attorneyName: row.attorneyName,
    barNumber: row.barNumber,
    stateCode: row.stateCode,
    isActive: row.isActive,
    intervalHours: row.intervalHours,
    lastCheckedAt: row.lastCheckedAt,
    email: row.email,
    whatsapp: row.whatsapp,
    notifyByEmail: row.notifyByEmail,
    notifyByWhatsapp: row.notifyByWhatsapp,
  };
}
