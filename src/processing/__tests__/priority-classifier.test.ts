import { describe, it, expect } from "vitest";
import { classifyPriority, priorityLabel, raisePriority } from "../priority-classifier";
import { PRIORITY_LEVEL } from "../../config/constants";

describe("classifyPriority", () => {
  it("is LOW when nothing matches", () => {
    expect(classifyPriority("Juntada de documento.")).toEqual({
      priority: PRIORITY_LEVEL.LOW,
      keywords: [],
    });
  });

  it("is MEDIUM for a single keyword", () => {
    expect(classifyPriority("Despacho de mero expediente.")).toEqual({
      priority: PRIORITY_LEVEL.MEDIUM,
      keywords: ["despacho"],
    });
  });

  it("is HIGH for two keywords", () => {
    expect(classifyPriority("Sentença proferida e penhora determinada.")).toEqual({
      priority: PRIORITY_LEVEL.HIGH,
      keywords: ["sentença", "penhora"],
    });
  });

  it("is URGENT for three keywords", () => {
    const analysis = classifyPriority("Sentença proferida. Decisão sobre penhora.");
    expect(analysis.priority).toBe(PRIORITY_LEVEL.URGENT);
    expect(analysis.keywords).toEqual(["sentença", "decisão", "penhora"]);
  });

  it("raises to URGENT for a deadline of five days or less", () => {
    expect(
      classifyPriority("Intimação para apresentar contestação no prazo de 5 dias.")
    ).toEqual({
      priority: PRIORITY_LEVEL.URGENT,
      keywords: ["prazo", "intimação", "Prazo de 5 dias"],
    });
  });

  it("reads a singular deadline", () => {
    expect(classifyPriority("No prazo de 1 dia.")).toEqual({
      priority: PRIORITY_LEVEL.URGENT,
      keywords: ["prazo", "Prazo de 1 dias"],
    });
  });

  it("raises to HIGH for a deadline up to fifteen days", () => {
    expect(classifyPriority("Manifeste-se no prazo de 10 dias.")).toEqual({
      priority: PRIORITY_LEVEL.HIGH,
      keywords: ["prazo", "Prazo de 10 dias"],
    });
  });

  it("ignores longer deadlines", () => {
    expect(classifyPriority("Manifeste-se no prazo de 30 dias.")).toEqual({
      priority: PRIORITY_LEVEL.MEDIUM,
      keywords: ["prazo"],
    });
  });

  it("raises to HIGH for a scheduled hearing", () => {
    expect(classifyPriority("Fica designada audiência para 10/05/2024.")).toEqual({
      priority: PRIORITY_LEVEL.HIGH,
      keywords: ["audiência", "Audiência em 10/05/2024"],
    });
  });

  it("never lowers a level", () => {
    const analysis = classifyPriority(
      "Liminar deferida. Citação e intimação. Audiência em 01/02/2025."
    );
    expect(analysis.priority).toBe(PRIORITY_LEVEL.URGENT);
    expect(analysis.keywords).toEqual([
      "liminar",
      "intimação",
      "citação",
      "audiência",
      "Audiência em 01/02/2025",
    ]);
  });
});

describe("raisePriority", () => {
  it("keeps the higher level", () => {
    expect(raisePriority(PRIORITY_LEVEL.HIGH, PRIORITY_LEVEL.MEDIUM)).toBe(PRIORITY_LEVEL.HIGH);
    expect(raisePriority(PRIORITY_LEVEL.LOW, PRIORITY_LEVEL.URGENT)).toBe(PRIORITY_LEVEL.URGENT);
  });
});

describe("priorityLabel", () => {
  it("labels every level", () => {
    expect(priorityLabel(PRIORITY_LEVEL.LOW)).toBe("Baixa");
    expect(priorityLabel(PRIORITY_LEVEL.MEDIUM)).toBe("Média");
    expect(priorityLabel(PRIORITY_LEVEL.HIGH)).toBe("Alta");
    expect(priorityLabel(PRIORITY_LEVEL.URGENT)).toBe("URGENTE");
  });
});
