/**
 * Environment Configuration
 *
 * Centralizes all environment variables into a typed configuration object.
 * All modules import config from here instead of reading process.env directly.
 *
 * Groups:
 * - Server: Express API settings
 * - Database: MySQL connection (subscriptions, cases, publications, logs)
 * - Redis: BullMQ queue backend
 * - Registry: external publication search endpoint and fetch behaviour
 * - Monitor: per-subscription cycle policy
 * - Worker/Scheduler: concurrency and sweep schedule
 * - Notifications: SMTP and WhatsApp gateway
 * - Auth: Service-to-service authentication
 */
import dotenv from "dotenv";

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

const config = {
  // --- Server ---
  env: process.env.NODE_ENV || "development",
  port: intFromEnv("PORT", 4000),
  logLevel: process.env.LOG_LEVEL || "info",

  // --- Database ---
  dbUser: process.env.DB_USER || "root",
  dbPassword: process.env.DB_PASSWORD || "",
  dbHost: process.env.DB_HOST || "localhost",
  dbPort: process.env.DB_PORT || "3306",
  dbName: process.env.DB_NAME || "db_oab_monitor",

  // --- Redis (BullMQ job queues) ---
  redisHost: process.env.REDIS_HOST || "localhost",
  redisPort: intFromEnv("REDIS_PORT", 6379),
  redisPassword: process.env.REDIS_PASSWORD || undefined,

  // --- Publication registry ---
  registryBaseUrl:
    process.env.REGISTRY_BASE_URL || "https://comunica.pje.jus.br/consulta",
  requestTimeoutMs: intFromEnv("REQUEST_TIMEOUT_MS", 30000),
  fetchMaxAttempts: intFromEnv("FETCH_MAX_ATTEMPTS", 3),
  fetchBackoffBaseMs: intFromEnv("FETCH_BACKOFF_BASE_MS", 1000),
  fetchBackoffMaxMs: intFromEnv("FETCH_BACKOFF_MAX_MS", 10000),
  rateLimitIntervalMs: intFromEnv("RATE_LIMIT_INTERVAL_MS", 1000),
  pageSize: intFromEnv("PAGE_SIZE", 50),
  pageConcurrency: intFromEnv("PAGE_CONCURRENCY", 4),
  httpProxyUrl: process.env.HTTP_PROXY_URL || undefined,

  // --- Monitor cycle policy ---
  monitorInitialDelayMs: intFromEnv("MONITOR_INITIAL_DELAY_MS", 60_000),
  monitorRetryBackoffMs: intFromEnv("MONITOR_RETRY_BACKOFF_MS", 30 * 60_000),
  monitorMaxRetries: intFromEnv("MONITOR_MAX_RETRIES", 3),
  monitorLookbackOverlapDays: intFromEnv("MONITOR_LOOKBACK_OVERLAP_DAYS", 1),
  monitorRetroactiveDays: intFromEnv("MONITOR_RETROACTIVE_DAYS", 7),

  // --- Worker / Scheduler ---
  workerConcurrency: intFromEnv("WORKER_CONCURRENCY", 3),
  schedulerCron: process.env.SCHEDULER_CRON || "0 6 * * *",

  // --- Notifications ---
  smtpHost: process.env.SMTP_HOST || "",
  smtpPort: intFromEnv("SMTP_PORT", 587),
  smtpSecure: process.env.SMTP_SECURE === "true",
  smtpUser: process.env.SMTP_USER || "",
  smtpPassword: process.env.SMTP_PASSWORD || "",
  emailFrom: process.env.EMAIL_FROM || "notificacoes@example.com",
  whatsappApiUrl: process.env.WHATSAPP_API_URL || "",
  whatsappApiToken: process.env.WHATSAPP_API_TOKEN || "",
  publicAppUrl: process.env.PUBLIC_APP_URL || "http://localhost:3000",

  // --- Service Authentication ---
  serviceSecret: process.env.SERVICE_SECRET || "change-this-to-a-strong-secret",
};

export default config;
