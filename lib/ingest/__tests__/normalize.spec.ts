import { describe, it, expect } from "vitest";
import { PLAYER_COLUMNS, TITLE_COLUMNS, TITLE_SCHEMA, playerSchema, toInteger } from "@/lib/ingest/schemas";
import { hasCanonicalLayout, missingColumns, normalizeHeader, normalizeRecords } from "@/lib/ingest/normalize";
import { canonicalKey } from "@/lib/ingest/aliases";

const schema = playerSchema("Sub-20");

describe("record normalizer", () => {
  it("maps arbitrary key casing and spacing onto the canonical columns, in order", () => {
    const [r] = normalizeRecords(
      [
        {
          " NAME ": "Da Silva",
          Year: "2019",
          POSITION: "Meia",
          " competition": "Mundial",
          "Goals ": 2,
          minutes: "90",
          Category: "Sub-17",
          "": "stray",
          "extra col": "dropped",
        },
      ],
      schema
    );
    expect(Object.keys(r)).toEqual([...PLAYER_COLUMNS]);
    expect(r).toEqual({
      name: "Da Silva",
      year: 2019,
      position: "Meia",
      competition: "Mundial",
      goals: 2,
      minutes: 90,
      category: "Sub-17",
    });
  });

  it("understands the Portuguese sheet headers", () => {
    const [r] = normalizeRecords(
      [{ Nome: "Vinícius", Ano: "2018", "Posição": "Atacante", "Competição": "Sul-Americano", Gols: "3", Minutagem: "270", Categoria: "Sub-17" }],
      schema
    );
    expect(r).toEqual({
      name: "Vinícius",
      year: 2018,
      position: "Atacante",
      competition: "Sul-Americano",
      goals: 3,
      minutes: 270,
      category: "Sub-17",
    });
  });

  it("fills absent columns with null and category with the configured fallback", () => {
    const [r] = normalizeRecords([{ name: "Oliveira" }], schema);
    expect(r).toEqual({
      name: "Oliveira",
      year: null,
      position: null,
      competition: null,
      goals: null,
      minutes: null,
      category: "Sub-20",
    });
  });

  it("keeps an explicitly blank text cell distinct from a missing one", () => {
    const [r] = normalizeRecords([{ name: "Oliveira", category: "", position: null }], schema);
    expect(r.category).toBe("");
    expect(r.position).toBeNull();
  });

  it("turns unparseable numbers into null without throwing", () => {
    const rows = [
      { name: "A", year: "abc", goals: "2.5", minutes: "" },
      { name: "B", year: 2019.0, goals: "  4 ", minutes: "2.0" },
      { name: "C", year: {}, goals: Number.NaN, minutes: true },
    ];
    expect(() => normalizeRecords(rows, schema)).not.toThrow();
    const [a, b, c] = normalizeRecords(rows, schema);
    expect([a.year, a.goals, a.minutes]).toEqual([null, null, null]);
    expect([b.year, b.goals, b.minutes]).toEqual([2019, 4, 2]);
    expect([c.year, c.goals, c.minutes]).toEqual([null, null, null]);
  });

  it("keeps the first of two keys that canonicalize alike", () => {
    const [r] = normalizeRecords([{ Name: "First", name: "Second" }], schema);
    expect(r.name).toBe("First");
  });

  it("reads titles written under the older two-column layout", () => {
    const [t] = normalizeRecords([{ titulo: "Copa São Paulo", categoria: "Sub-20" }], TITLE_SCHEMA);
    expect(t).toEqual({ category: "Sub-20", title: "Copa São Paulo", year: null });
  });
});

describe("header helpers", () => {
  it("canonicalizes keys", () => {
    expect(canonicalKey("  Call   Up  Year ")).toBe("call_up_year");
    expect(canonicalKey("MINUTAGEM")).toBe("minutes");
    expect(canonicalKey("   ")).toBe("");
  });

  it("drops blanks and duplicates from a header", () => {
    expect(normalizeHeader([" Nome", "nome", "", "Gols"])).toEqual(["name", "goals"]);
  });

  it("lists required columns missing from a header, in canonical order", () => {
    expect(missingColumns(["name", "year", "position", "competition", "minutes", "category"], schema)).toEqual(["goals"]);
    expect(missingColumns(["Categoria"], schema)).toEqual(["name", "year", "position", "competition", "goals", "minutes"]);
    expect(missingColumns([...PLAYER_COLUMNS], schema)).toEqual([]);
  });

  it("accepts a header only when it is the canonical columns in order", () => {
    expect(hasCanonicalLayout(["Categoria", "Título", "Ano"], TITLE_COLUMNS)).toBe(true);
    expect(hasCanonicalLayout(["Titulo", "Categoria"], TITLE_COLUMNS)).toBe(false);
    expect(hasCanonicalLayout(["title", "category", "year"], TITLE_COLUMNS)).toBe(false);
    expect(hasCanonicalLayout([], TITLE_COLUMNS)).toBe(false);
  });
});

describe("integer cells", () => {
  it("reads decimal integers", () => {
    expect(toInteger(" 42 ")).toBe(42);
    expect(toInteger("+3")).toBe(3);
    expect(toInteger("-1")).toBe(-1);
    expect(toInteger("2.0")).toBe(2);
    expect(toInteger(7)).toBe(7);
  });

  it("leaves anything else missing", () => {
    expect(toInteger("0x1F")).toBeNull();
    expect(toInteger("1e3")).toBeNull();
    expect(toInteger("2.5")).toBeNull();
    expect(toInteger("")).toBeNull();
    expect(toInteger(2.5)).toBeNull();
    expect(toInteger(null)).toBeNull();
  });
});
