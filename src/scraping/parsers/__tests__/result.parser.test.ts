import { describe, it, expect } from "vitest";
import { parseSearchResponse } from "../result.parser";
import { computeIdentity } from "../../../processing/identity";
import type { SearchQuery } from "../../../shared/types/search.types";
import { renderPage, sampleRecord } from "../../__tests__/registry-page.fixture";

const query: SearchQuery = { barNumber: "123456", stateCode: "SP", page: 1, pageSize: 50 };
const now = new Date("2024-04-01T12:00:00.000Z");

describe("parseSearchResponse", () => {
  it("reads records and pagination with the primary selectors", () => {
    const body = renderPage(
      [
        sampleRecord(1, { notebook: "Judicial I", href: "/processo/1" }),
        sampleRecord(2, { caseNumber: "12345672023801234560" }),
      ],
      { total: 2, page: 1 }
    );

    const result = parseSearchResponse(body, query, {
      now,
      baseUrl: "https://registry.example.test/consulta",
    });

    expect(result.error).toBeNull();
    expect(result.totalFound).toBe(2);
    expect(result.totalPages).toBe(1);
    expect(result.currentPage).toBe(1);
    expect(result.fetchedAt).toBe(now);
    expect(result.publications).toHaveLength(2);

    const [first, second] = result.publications;
    expect(first.caseNumber).toBe("0000001-12.2024.8.26.0100");
    expect(first.publishedAt.toISOString()).toBe("2024-03-15T03:00:00.000Z");
    expect(first.court).toBe("1ª Vara Cível");
    expect(first.content).toBe("Intimação número 1. Manifeste-se a parte autora.");
    expect(first.tribunalName).toBe("TJSP");
    expect(first.notebook).toBe("Judicial I");
    expect(first.sourceUrl).toBe("https://registry.example.test/processo/1");
    expect(second.caseNumber).toBe("1234567-20.2380.1.23.4560");
    expect(second.notebook).toBeUndefined();
    expect(second.sourceUrl).toBeUndefined();
  });

  it("falls back to the secondary selectors", () => {
    const body = renderPage([sampleRecord(7, { date: "2024-03-15" })], {
      total: 1250,
      page: 3,
      fallback: true,
    });

    const result = parseSearchResponse(body, { ...query, page: 3 }, { now });

    expect(result.totalFound).toBe(1250);
    expect(result.totalPages).toBe(25);
    expect(result.currentPage).toBe(3);
    expect(result.publications).toHaveLength(1);
    expect(result.publications[0].caseNumber).toBe("0000007-12.2024.8.26.0100");
    expect(result.publications[0].publishedAt.toISOString()).toBe("2024-03-15T03:00:00.000Z");
    expect(result.publications[0].court).toBe("1ª Vara Cível");
  });

  it("drops a record without case number and keeps the rest in order", () => {
    const body = renderPage([
      sampleRecord(1),
      { date: "15/03/2024", court: "2ª Vara", content: "Sem número." },
      sampleRecord(3),
    ]);

    const result = parseSearchResponse(body, query, { now });

    expect(result.error).toBeNull();
    expect(result.publications.map((p) => p.caseNumber)).toEqual([
      "0000001-12.2024.8.26.0100",
      "0000003-12.2024.8.26.0100",
    ]);
  });

  it("counts the records on the page when there is no pagination block", () => {
    const body = renderPage([sampleRecord(1), sampleRecord(2), sampleRecord(3)]);

    const result = parseSearchResponse(body, { ...query, pageSize: 2 }, { now });

    expect(result.totalFound).toBe(3);
    expect(result.totalPages).toBe(2);
    expect(result.currentPage).toBe(1);
  });

  it("defaults missing optional text fields", () => {
    const body = renderPage([{ caseNumber: "proc-42", date: "15/03/2024" }]);

    const [publication] = parseSearchResponse(body, query, { now }).publications;

    expect(publication.caseNumber).toBe("proc-42");
    expect(publication.court).toBe("N/A");
    expect(publication.content).toBe("N/A");
    expect(publication.tribunalName).toBe("N/A");
  });

  it("reads a date embedded in longer text", () => {
    const body = renderPage([sampleRecord(1, { date: "Disponibilizado em 20/02/2024 às 10h" })]);

    const [publication] = parseSearchResponse(body, query, { now }).publications;

    expect(publication.publishedAt.toISOString()).toBe("2024-02-20T03:00:00.000Z");
  });

  it("uses the fetch instant when the date cannot be read", () => {
    const body = renderPage([sampleRecord(1, { date: "sem data" })]);

    const [publication] = parseSearchResponse(body, query, { now }).publications;

    expect(publication.publishedAt.getTime()).toBe(now.getTime());
  });

  it("builds frozen publications with a stable identity", () => {
    const body = renderPage([sampleRecord(1)]);

    const [a] = parseSearchResponse(body, query, { now }).publications;
    const [b] = parseSearchResponse(body, query, { now }).publications;

    expect(Object.isFrozen(a)).toBe(true);
    expect(a.identityHash).toBe(b.identityHash);
    expect(a.identityHash).toBe(
      computeIdentity({
        caseNumber: "0000001-12.2024.8.26.0100",
        publishedAt: new Date("2024-03-15T03:00:00.000Z"),
        court: "1ª Vara Cível",
      })
    );
  });

  it("returns an empty page for a body with no records", () => {
    const result = parseSearchResponse("<html><body><p>Nenhuma publicação.</p></body></html>", query, {
      now,
    });

    expect(result.error).toBeNull();
    expect(result.publications).toEqual([]);
    expect(result.totalFound).toBe(0);
    expect(result.totalPages).toBe(0);
  });
});
