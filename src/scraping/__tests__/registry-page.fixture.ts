/**
 * Builders for registry results pages used across parser, search and
 * monitor tests. Markup mirrors REGISTRY.SELECTORS.
 */
export interface RecordFixture {
  caseNumber?: string;
  date?: string;
  court?: string;
  content?: string;
  tribunal?: string;
  notebook?: string;
  href?: string;
}

export interface PageFixture {
  /** Total announced in the pagination block; omit for no pagination block */
  total?: number;
  /** Active page shown in the pagination block */
  page?: number;
  /** Use the secondary selectors throughout */
  fallback?: boolean;
}

export function renderRecord(record: RecordFixture, fallback = false): string {
  const parts: string[] = [];
  const field = (primary: string, secondary: string, value: string | undefined) => {
    if (value === undefined) return;
    const [tag, cls] = (fallback ? secondary : primary).split(".");
    parts.push(`<${tag} class="${cls}">${value}</${tag}>`);
  };

  field("div.numero-processo", "span.processo-numero", record.caseNumber);
  field("div.data-publicacao", "span.data", record.date);
  field("div.orgao-julgador", "span.orgao", record.court);
  field("div.conteudo-publicacao", "div.texto-publicacao", record.content);
  field("div.tribunal", "span.tribunal", record.tribunal);
  field("div.caderno", "span.caderno", record.notebook);
  if (record.href !== undefined) {
    parts.push(`<a class="${fallback ? "link" : "link-processo"}" href="${record.href}">Ver processo</a>`);
  }

  const wrapper = fallback ? "resultado-item" : "publicacao";
  return `<div class="${wrapper}">${parts.join("")}</div>`;
}

export function renderPage(records: RecordFixture[], options: PageFixture = {}): string {
  const { total, page = 1, fallback = false } = options;
  const items = records.map((record) => renderRecord(record, fallback)).join("\n");

  let pagination = "";
  if (total !== undefined) {
    const summary = `Exibindo resultados de ${withThousandDots(total)} resultados`;
    pagination = fallback
      ? `<ul class="pagination"><li class="info">${summary}</li><li>1</li><li class="active">${page}</li></ul>`
      : `<div class="paginacao"><p>${summary}</p><ul><li class="active"><span>${page}</span></li></ul></div>`;
  }

  return `<html><head><title>Consulta</title></head><body><main>${items}</main>${pagination}</body></html>`;
}

/** A well-formed record whose case number is derived from `n` */
export function sampleRecord(n: number, overrides: RecordFixture = {}): RecordFixture {
  return {
    caseNumber: `${String(n).padStart(7, "0")}-12.2024.8.26.0100`,
    date: "15/03/2024",
    court: "1ª Vara Cível",
    content: `Intimação número ${n}. Manifeste-se a parte autora.`,
    tribunal: "TJSP",
    ...overrides,
  };
}

function withThousandDots(value: number): string {
  return String(value).replace(/\B(?=(\d{3})+(?!\d))/g, ".");
}
