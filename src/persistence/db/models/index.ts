/**
 * Database Models Index
 *
 * Models used by the monitor:
 *
 * READ:
 * - OAB_SUBSCRIPTION            → Attorneys to monitor and their preferences
 *
 * WRITE:
 * - OAB_SUBSCRIPTION            → Update last_checked_at
 * - JUDICIAL_CASE               → Create cases on first publication
 * - JUDICIAL_CASE_SUBSCRIPTION  → Link attorneys to their cases
 * - MONITORED_PUBLICATION       → Store new publications (unique identity_hash)
 * - MONITOR_LOG                 → One row per cycle outcome
 */
import {
  type CreationOptional,
  DataTypes,
  type ForeignKey,
  type InferAttributes,
  type InferCreationAttributes,
  Model,
} from "sequelize";
import { MONITOR_LOG_STATUS, STATE_CODES } from "../../../config/constants";
import type { MonitorLogStatus, PriorityLevel } from "../../../shared/types/monitor.types";
import type { StateCode } from "../../../shared/types/search.types";
import sequelize from "../sequelize";

// ============================================================
// OAB_SUBSCRIPTION: An attorney registration under monitoring
// ============================================================
export class AttorneySubscription extends Model<
  InferAttributes<AttorneySubscription>,
  InferCreationAttributes<AttorneySubscription>
> {
  declare id: CreationOptional<number>;
  declare attorneyName: string;
  declare barNumber: string;
  declare stateCode: StateCode;
  declare isActive: CreationOptional<boolean>;
  declare intervalHours: CreationOptional<number>;
  declare lastCheckedAt: CreationOptional<Date | null>;
  declare email: CreationOptional<string | null>;
  declare whatsapp: CreationOptional<string | null>;
  declare notifyByEmail: CreationOptional<boolean>;
  declare notifyByWhatsapp: CreationOptional<boolean>;
  declare createdAt: CreationOptional<Date>;
  declare updatedAt: CreationOptional<Date>;
}
AttorneySubscription.init(
  {
    id: {
      type: DataTypes.INTEGER,
      primaryKey: true,
      autoIncrement: true,
      field: "id_oab_subscription",
    },
    attorneyName: { type: DataTypes.STRING(200), allowNull: false, field: "attorney_name" },
    barNumber: { type: DataTypes.STRING(20), allowNull: false, field: "bar_number" },
    stateCode: { type: DataTypes.ENUM(...STATE_CODES), allowNull: false, field: "state_code" },
    isActive: { type: DataTypes.BOOLEAN, defaultValue: true, field: "is_active" },
    intervalHours: { type: DataTypes.INTEGER, defaultValue: 24, field: "interval_hours" },
    lastCheckedAt: { type: DataTypes.DATE, allowNull: true, field: "last_checked_at" },
    email: { type: DataTypes.STRING(200), allowNull: true, field: "email" },
    whatsapp: { type: DataTypes.STRING(30), allowNull: true, field: "whatsapp" },
    notifyByEmail: { type: DataTypes.BOOLEAN, defaultValue: true, field: "notify_by_email" },
    notifyByWhatsapp: { type: DataTypes.BOOLEAN, defaultValue: false, field: "notify_by_whatsapp" },
    createdAt: { type: DataTypes.DATE, field: "created_at" },
    updatedAt: { type: DataTypes.DATE, field: "updated_at" },
  },
  {
    sequelize,
    tableName: "OAB_SUBSCRIPTION",
    modelName: "OAB_SUBSCRIPTION",
    timestamps: true,
    indexes: [
      { unique: true, fields: ["bar_number", "state_code"], name: "uq_bar_registration" },
      { fields: ["is_active"], name: "idx_active" },
    ],
  }
);

// ============================================================
// JUDICIAL_CASE: One row per CNJ case number
// ============================================================
export class JudicialCase extends Model<
  InferAttributes<JudicialCase>,
  InferCreationAttributes<JudicialCase>
> {
  declare id: CreationOptional<number>;
  declare caseNumber: string;
  declare tribunalName: string;
  declare court: string;
  declare createdAt: CreationOptional<Date>;
  declare updatedAt: CreationOptional<Date>;
}
JudicialCase.init(
  {
    id: {
      type: DataTypes.INTEGER,
      primaryKey: true,
      autoIncrement: true,
      field: "id_judicial_case",
    },
    caseNumber: { type: DataTypes.STRING(50), allowNull: false, unique: true, field: "case_number" },
    tribunalName: { type: DataTypes.STRING(150), allowNull: false, field: "tribunal_name" },
    court: { type: DataTypes.STRING(255), allowNull: false, field: "court" },
    createdAt: { type: DataTypes.DATE, field: "created_at" },
    updatedAt: { type: DataTypes.DATE, field: "updated_at" },
  },
  { sequelize, tableName: "JUDICIAL_CASE", modelName: "JUDICIAL_CASE", timestamps: true }
);

// ============================================================
// JUDICIAL_CASE_SUBSCRIPTION: Attorneys appearing in a case
// ============================================================
export class CaseSubscription extends Model<
  InferAttributes<CaseSubscription>,
  InferCreationAttributes<CaseSubscription>
> {
  declare caseId: ForeignKey<JudicialCase["id"]>;
  declare subscriptionId: ForeignKey<AttorneySubscription["id"]>;
}
CaseSubscription.init(
  {
    caseId: { type: DataTypes.INTEGER, primaryKey: true, field: "judicial_case_id" },
    subscriptionId: { type: DataTypes.INTEGER, primaryKey: true, field: "oab_subscription_id" },
  },
  {
    sequelize,
    tableName: "JUDICIAL_CASE_SUBSCRIPTION",
    modelName: "JUDICIAL_CASE_SUBSCRIPTION",
    timestamps: false,
  }
);

// ============================================================
// MONITORED_PUBLICATION: Ingested gazette entries
// ============================================================
export class MonitoredPublication extends Model<
  InferAttributes<MonitoredPublication>,
  InferCreationAttributes<MonitoredPublication>
> {
  declare id: CreationOptional<number>;
  declare caseId: ForeignKey<JudicialCase["id"]>;
  declare identityHash: string;
  declare publishedAt: Date;
  declare content: string;
  declare tribunalName: string;
  declare court: string;
  declare notebook: string | null;
  declare sourceUrl: string | null;
  declare priority: PriorityLevel;
  declare keywords: string[];
  declare summary: string;
  declare notifiedByEmail: CreationOptional<boolean>;
  declare notifiedByWhatsapp: CreationOptional<boolean>;
  declare createdAt: CreationOptional<Date>;
}
MonitoredPublication.init(
  {
    id: {
      type: DataTypes.INTEGER,
      primaryKey: true,
      autoIncrement: true,
      field: "id_monitored_publication",
    },
    caseId: { type: DataTypes.INTEGER, allowNull: false, field: "judicial_case_id" },
    identityHash: { type: DataTypes.STRING(64), allowNull: false, unique: true, field: "identity_hash" },
    publishedAt: { type: DataTypes.DATE, allowNull: false, field: "published_at" },
    content: { type: DataTypes.TEXT("medium"), allowNull: false, field: "content" },
    tribunalName: { type: DataTypes.STRING(150), allowNull: false, field: "tribunal_name" },
    court: { type: DataTypes.STRING(255), allowNull: false, field: "court" },
    notebook: { type: DataTypes.STRING(150), allowNull: true, field: "notebook" },
    sourceUrl: { type: DataTypes.STRING(500), allowNull: true, field: "source_url" },
    priority: { type: DataTypes.TINYINT, allowNull: false, field: "priority" },
    keywords: { type: DataTypes.JSON, allowNull: false, field: "keywords" },
    summary: { type: DataTypes.TEXT, allowNull: false, field: "summary" },
    notifiedByEmail: {
      type: DataTypes.BOOLEAN,
      allowNull: false,
      defaultValue: false,
      field: "notified_by_email",
    },
    notifiedByWhatsapp: {
      type: DataTypes.BOOLEAN,
      allowNull: false,
      defaultValue: false,
      field: "notified_by_whatsapp",
    },
    createdAt: { type: DataTypes.DATE, field: "created_at", defaultValue: DataTypes.NOW },
  },
  {
    sequelize,
    tableName: "MONITORED_PUBLICATION",
    modelName: "MONITORED_PUBLICATION",
    timestamps: false,
    indexes: [{ fields: ["judicial_case_id", "published_at"], name: "idx_case_published" }],
  }
);

// ============================================================
// MONITOR_LOG: Outcome of every monitor cycle
// ============================================================
export class MonitorLog extends Model<InferAttributes<MonitorLog>, InferCreationAttributes<MonitorLog>> {
  declare id: CreationOptional<number>;
  declare subscriptionId: ForeignKey<AttorneySubscription["id"]>;
  declare status: MonitorLogStatus;
  declare publicationsFound: number;
  declare publicationsNew: number;
  declare message: string;
  declare error: string | null;
  declare createdAt: CreationOptional<Date>;
}
MonitorLog.init(
  {
    id: {
      type: DataTypes.INTEGER,
      primaryKey: true,
      autoIncrement: true,
      field: "id_monitor_log",
    },
    subscriptionId: { type: DataTypes.INTEGER, allowNull: false, field: "oab_subscription_id" },
    status: {
      type: DataTypes.ENUM(...Object.values(MONITOR_LOG_STATUS)),
      allowNull: false,
      field: "status",
    },
    publicationsFound: { type: DataTypes.INTEGER, defaultValue: 0, field: "publications_found" },
    publicationsNew: { type: DataTypes.INTEGER, defaultValue: 0, field: "publications_new" },
    message: { type: DataTypes.STRING(500), allowNull: false, field: "message" },
    error: { type: DataTypes.TEXT, allowNull: true, field: "error" },
    createdAt: { type: DataTypes.DATE, field: "created_at", defaultValue: DataTypes.NOW },
  },
  {
    sequelize,
    tableName: "MONITOR_LOG",
    modelName: "MONITOR_LOG",
    timestamps: false,
    indexes: [{ fields: ["oab_subscription_id", "created_at"], name: "idx_subscription_log" }],
  }
);

// --- Associations ---
MonitoredPublication.belongsTo(JudicialCase, { foreignKey: "caseId", as: "judicialCase" });
JudicialCase.belongsToMany(AttorneySubscription, {
  through: CaseSubscription,
  foreignKey: "caseId",
  otherKey: "subscriptionId",
  as: "subscriptions",
});
MonitorLog.belongsTo(AttorneySubscription, { foreignKey: "subscriptionId", as: "subscription" });

export default {
  AttorneySubscription,
  JudicialCase,
  CaseSubscription,
  MonitoredPublication,
  MonitorLog,
};
