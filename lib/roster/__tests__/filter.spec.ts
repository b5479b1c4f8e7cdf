import { describe, it, expect } from "vitest";
import type { PlayerRecord, TitleRecord } from "@/lib/domain/types";
import { ALL } from "@/lib/roster/config";
import { NO_FILTERS, filterOptions, filterPlayers, sortForDisplay } from "@/lib/roster/filter";
import { summarize } from "@/lib/roster/summary";
import { filterTitles, groupTitlesByCategory, titleCategories } from "@/lib/roster/titles";

function rec(name: string | null, year: number | null, overrides: Partial<PlayerRecord> = {}): PlayerRecord {
  return { name, year, position: "Meia", competition: "Mundial", goals: 0, minutes: 0, category: "Sub-20", ...overrides };
}

const records: PlayerRecord[] = [
  rec("Da Silva", 2020, { position: "Atacante", goals: 3, minutes: 180 }),
  rec("Oliveira", 2019, { competition: "Sul-Americano", minutes: 90 }),
  rec("SILVA Jr", 2019, { category: "Sub-17", goals: 1 }),
  rec(null, 2021),
  rec("Abel", null),
];

const names = (rs: PlayerRecord[]) => rs.map((r) => r.name);

describe("filter engine", () => {
  it("returns the input untouched when no filter is active", () => {
    expect(filterPlayers(records, NO_FILTERS)).toBe(records);
    expect(filterPlayers(records)).toBe(records);
    expect(filterPlayers(records, { name: "   ", year: ALL })).toBe(records);
  });

  it("matches names case-insensitively by substring", () => {
    expect(names(filterPlayers(records, { name: "silva" }))).toEqual(["Da Silva", "SILVA Jr"]);
    expect(names(filterPlayers(records, { name: "OLIV" }))).toEqual(["Oliveira"]);
  });

  it("applies exact-match filters", () => {
    expect(names(filterPlayers(records, { category: "Sub-17" }))).toEqual(["SILVA Jr"]);
    expect(names(filterPlayers(records, { position: "Atacante" }))).toEqual(["Da Silva"]);
    expect(names(filterPlayers(records, { competition: "Sul-Americano" }))).toEqual(["Oliveira"]);
    expect(names(filterPlayers(records, { year: 2021 }))).toEqual([null]);
  });

  it("combines active filters with AND and keeps input order", () => {
    expect(names(filterPlayers(records, { name: "silva", year: 2019 }))).toEqual(["SILVA Jr"]);
    expect(names(filterPlayers(records, { competition: "Mundial", category: "Sub-20" }))).toEqual([
      "Da Silva",
      null,
      "Abel",
    ]);
    expect(filterPlayers(records, { name: "silva", category: "Sub-15" })).toEqual([]);
  });
});

describe("presentation helpers", () => {
  it("sorts by year then name with missing values last, without touching the input", () => {
    expect(names(sortForDisplay(records))).toEqual(["Oliveira", "SILVA Jr", "Da Silva", null, "Abel"]);
    expect(records[0].name).toBe("Da Silva");
  });

  it("lists distinct filter choices", () => {
    expect(filterOptions(records, "category")).toEqual(["Sub-17", "Sub-20"]);
    expect(filterOptions(records, "competition")).toEqual(["Mundial", "Sul-Americano"]);
    expect(filterOptions(records, "year")).toEqual([2019, 2020, 2021]);
  });

  it("summarizes totals and counts", () => {
    expect(summarize(records)).toEqual({
      callUps: 5,
      goals: 4,
      minutes: 270,
      byYear: [
        { year: 2019, count: 2 },
        { year: 2020, count: 1 },
        { year: 2021, count: 1 },
      ],
      byCompetition: [
        { competition: "Mundial", count: 4 },
        { competition: "Sul-Americano", count: 1 },
      ],
    });
  });

  it("summarizes an empty list", () => {
    expect(summarize([])).toEqual({ callUps: 0, goals: 0, minutes: 0, byYear: [], byCompetition: [] });
  });
});

describe("titles", () => {
  const titles: TitleRecord[] = [
    { category: "Sub-20", title: "Copa São Paulo", year: 2020 },
    { category: "Sub-17", title: "Brasileiro", year: 2019 },
    { category: "Sub-20", title: "Brasileiro", year: null },
    { category: null, title: "Sem categoria", year: null },
  ];

  it("filters by category", () => {
    expect(filterTitles(titles)).toBe(titles);
    expect(filterTitles(titles, "Sub-17")).toEqual([titles[1]]);
  });

  it("groups titles under sorted categories", () => {
    expect(groupTitlesByCategory(titles)).toEqual([
      { category: "Sub-17", titles: ["Brasileiro"] },
      { category: "Sub-20", titles: ["Brasileiro", "Copa São Paulo"] },
    ]);
    expect(titleCategories(titles)).toEqual(["Sub-17", "Sub-20"]);
  });
});
