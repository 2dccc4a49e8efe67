import { describe, it, expect } from "vitest";
import { InternalAxiosRequestConfig } from "axios";
import { SearchService } from "../search.service";
import { FetchClient } from "../../http/fetch-client";
import { RateLimiter } from "../../http/rate-limiter";
import { ValidationError } from "../../../shared/errors/scrape.errors";
import { StubReply, stubHttp } from "../../__tests__/axios-stub";
import { RecordFixture, renderPage, sampleRecord } from "../../__tests__/registry-page.fixture";

const BASE_URL = "https://registry.example.test/consulta";
const clock = () => new Date("2024-03-15T12:00:00.000Z");

function records(from: number, to: number) {
  const list: RecordFixture[] = [];
  for (let n = from; n <= to; n++) list.push(sampleRecord(n));
  return list;
}

/** Two pages: 50 records then 10, announcing 60 in total */
function twoPageRegistry(config: InternalAxiosRequestConfig): StubReply {
  const page = Number(config.params?.pagina);
  if (page === 1) return { status: 200, body: renderPage(records(1, 50), { total: 60, page: 1 }) };
  if (page === 2) return { status: 200, body: renderPage(records(51, 60), { total: 60, page: 2 }) };
  return { status: 404, body: "" };
}

function makeService(reply: StubReply[] | ((config: InternalAxiosRequestConfig) => StubReply)) {
  const stub = stubHttp(reply);
  const fetchClient = new FetchClient({
    http: stub.http,
    rateLimiter: new RateLimiter(0),
    maxAttempts: 1,
    sleep: async () => undefined,
  });
  const service = new SearchService({ fetchClient, baseUrl: BASE_URL, pageSize: 50, clock });
  return { service, calls: stub.calls };
}

describe("SearchService", () => {
  it("merges a two-page result", async () => {
    const { service, calls } = makeService(twoPageRegistry);

    const result = await service.searchByPeriod("123456", "SP");

    expect(calls).toHaveLength(2);
    expect(result.error).toBeNull();
    expect(result.totalFound).toBe(60);
    expect(result.totalPages).toBe(2);
    expect(result.publications).toHaveLength(60);
    expect(result.publications[59].caseNumber).toBe("0000060-12.2024.8.26.0100");
  });

  it("gives the same result in sequential mode", async () => {
    const { service } = makeService(twoPageRegistry);

    const result = await service.searchByPeriod("123456", "SP", undefined, undefined, {
      mode: "sequential",
    });

    expect(result.totalFound).toBe(60);
    expect(result.totalPages).toBe(2);
  });

  it("sends the registry parameter names with an upper-cased state", async () => {
    const { service, calls } = makeService(twoPageRegistry);

    const result = await service.searchByPeriod(
      " 123456 ",
      "sp",
      new Date("2024-03-01T12:00:00.000Z"),
      new Date("2024-03-15T12:00:00.000Z")
    );

    expect(result.query.stateCode).toBe("SP");
    expect(calls[0].url).toBe(BASE_URL);
    expect(calls[0].params).toEqual({
      numeroOab: "123456",
      ufOab: "SP",
      pagina: "1",
      tamanhoPagina: "50",
      dataDisponibilizacaoInicio: "01/03/2024",
      dataDisponibilizacaoFim: "15/03/2024",
    });
  });

  it("searches the last N days up to now", async () => {
    const { service, calls } = makeService(twoPageRegistry);

    await service.searchLastDays("123456", "RJ", 7);

    expect(calls[0].params).toMatchObject({
      ufOab: "RJ",
      dataDisponibilizacaoInicio: "08/03/2024",
      dataDisponibilizacaoFim: "15/03/2024",
    });
  });

  it("rejects an unknown state before any request", async () => {
    const { service, calls } = makeService(twoPageRegistry);

    await expect(service.searchByPeriod("123456", "ZZ")).rejects.toBeInstanceOf(ValidationError);
    expect(calls).toHaveLength(0);
  });

  it("rejects a blank bar number and an inverted range", async () => {
    const { service, calls } = makeService(twoPageRegistry);

    await expect(service.searchByPeriod("   ", "SP")).rejects.toBeInstanceOf(ValidationError);
    await expect(
      service.searchByPeriod(
        "123456",
        "SP",
        new Date("2024-03-15T00:00:00.000Z"),
        new Date("2024-03-01T00:00:00.000Z")
      )
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(service.searchLastDays("123456", "SP", -1)).rejects.toBeInstanceOf(ValidationError);
    expect(calls).toHaveLength(0);
  });

  it("reports a failed first page in the error field", async () => {
    const { service } = makeService([{ status: 404, body: "" }]);

    const result = await service.searchByPeriod("123456", "SP");

    expect(result.error).toBe("Registry page not found (404)");
    expect(result.publications).toEqual([]);
    expect(result.totalFound).toBe(0);
    expect(result.fetchedAt.toISOString()).toBe("2024-03-15T12:00:00.000Z");
  });
});
