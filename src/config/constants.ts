/**
 * Application Constants
 *
 * Static values that don't change per environment.
 * Includes registry selectors and wire names, content markers,
 * priority keywords, queue names and error codes.
 */

// --- Queue Names ---
export const QUEUE_NAMES = {
  /** Delayed per-subscription monitor cycles (self-rescheduling) */
  MONITOR: "publication-monitor",
} as const;

// --- Brazilian state codes accepted for a bar registration ---
export const STATE_CODES = [
  "AC", "AL", "AM", "AP", "BA", "CE", "DF", "ES", "GO", "MA",
  "MG", "MS", "MT", "PA", "PB", "PE", "PI", "PR", "RJ", "RN",
  "RO", "RR", "RS", "SC", "SE", "SP", "TO",
] as const;

// --- Publication Registry ---
export const REGISTRY = {
  /** Query-string names the registry search form expects */
  PARAMS: {
    BAR_NUMBER: "numeroOab",
    STATE_CODE: "ufOab",
    PAGE: "pagina",
    PAGE_SIZE: "tamanhoPagina",
    START_DATE: "dataDisponibilizacaoInicio",
    END_DATE: "dataDisponibilizacaoFim",
  },
  /** Format of the date range parameters */
  PARAM_DATE_FORMAT: "DD/MM/YYYY",
  /** Default headers, mirroring a desktop browser */
  HEADERS: {
    "User-Agent":
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "Accept-Language": "pt-BR,pt;q=0.9,en-US;q=0.8,en;q=0.7",
    "Cache-Control": "max-age=0",
  },
  /**
   * Selectors used to read the results page.
   * Each field lists the primary selector first and its fallback second.
   */
  SELECTORS: {
    RECORDS: ["div.publicacao", "div.resultado-item"],
    PAGINATION: ["div.paginacao", "ul.pagination"],
    CURRENT_PAGE: ["li.active span", "li.active"],
    CASE_NUMBER: ["div.numero-processo", "span.processo-numero"],
    PUBLISHED_AT: ["div.data-publicacao", "span.data"],
    COURT: ["div.orgao-julgador", "span.orgao"],
    CONTENT: ["div.conteudo-publicacao", "div.texto-publicacao"],
    TRIBUNAL: ["div.tribunal", "span.tribunal"],
    NOTEBOOK: ["div.caderno", "span.caderno"],
    SOURCE_LINK: ["a.link-processo", "a.link"],
  },
  /** "Exibindo 1-50 de 320 resultados" */
  TOTAL_PATTERN: /de\s+([\d.]+)\s+resultados/i,
  /** Accepted publication date formats, tried in order */
  DATE_FORMATS: ["DD/MM/YYYY", "YYYY-MM-DD", "DD-MM-YYYY"],
  /** Placeholder for optional text fields missing from a record */
  MISSING_FIELD: "N/A",
} as const;

// --- Response content markers (matched case-insensitively) ---
export const CONTENT_MARKERS = {
  CAPTCHA: [
    "captcha",
    "verificação de segurança",
    "prove que você é humano",
    "não sou um robô",
  ],
  NOT_FOUND: [
    "página não encontrada",
    "página inexistente",
    "not found",
    "erro 404",
  ],
} as const;

// --- Priority Levels ---
// Ordered: classification only ever raises a level.
export const PRIORITY_LEVEL = {
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
  URGENT: 4,
} as const;

// --- Priority Keywords ---
// Deadline and urgent-procedure terms counted once each.
export const PRIORITY_KEYWORDS = [
  "liminar",
  "antecipação de tutela",
  "urgente",
  "mandado de segurança",
  "habeas corpus",
  "prazo",
  "intimação",
  "citação",
  "audiência",
  "sentença",
  "acórdão",
  "decisão",
  "despacho",
  "julgamento",
  "penhora",
  "bloqueio",
] as const;

export const SUMMARY = {
  MAX_SENTENCES: 3,
  MAX_LENGTH: 200,
  EMPTY: "Sem conteúdo para resumir.",
} as const;

// --- Error Codes ---
// Classified error types for monitor logs and retry decisions.
export const ERROR_CODES = {
  NETWORK_ERROR: "NETWORK_ERROR",
  CAPTCHA_DETECTED: "CAPTCHA_DETECTED",
  NOT_FOUND: "NOT_FOUND",
  REQUEST_REJECTED: "REQUEST_REJECTED",
  VALIDATION_FAILED: "VALIDATION_FAILED",
  PARSING_FAILED: "PARSING_FAILED",
  CYCLE_CANCELLED: "CYCLE_CANCELLED",
  SEARCH_FAILED: "SEARCH_FAILED",
  UNKNOWN: "UNKNOWN",
} as const;

// --- Monitor Log Statuses ---
export const MONITOR_LOG_STATUS = {
  SUCCESS: "SUCCESS",
  ERROR: "ERROR",
  FAILURE: "FAILURE",
  CANCELLED: "CANCELLED",
} as const;

// --- Ad-hoc search defaults (CLI and POST /search) ---
export const SEARCH_DEFAULTS = {
  DAYS: 7,
  OUTPUT_FILE: "publicacoes.json",
} as const;
