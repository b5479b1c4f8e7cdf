import type { PlayerRecord } from "@/lib/domain/types";
import { ALL, type All } from "@/lib/roster/config";

export type PlayerFilters = {
  name: string; // case-insensitive substring, "" = no filter
  category: string | All;
  position: string | All;
  competition: string | All;
  year: number | All;
};

export const NO_FILTERS: PlayerFilters = {
  name: "",
  category: ALL,
  position: ALL,
  competition: ALL,
  year: ALL,
};

export type FilterField = "category" | "position" | "competition" | "year";

function resolve(filters: Partial<PlayerFilters>): PlayerFilters {
  return {
    name: filters.name ?? NO_FILTERS.name,
    category: filters.category ?? ALL,
    position: filters.position ?? ALL,
    competition: filters.competition ?? ALL,
    year: filters.year ?? ALL,
  };
}

export function isActive(filters: Partial<PlayerFilters>): boolean {
  const f = resolve(filters);
  return (
    f.name.trim() !== "" ||
    f.category !== ALL ||
    f.position !== ALL ||
    f.competition !== ALL ||
    f.year !== ALL
  );
}

// Conjunction of the active filters. Keeps input order; with no active filter the input is returned as is.
export function filterPlayers<T extends PlayerRecord>(records: T[], filters: Partial<PlayerFilters> = {}): T[] {
  if (!isActive(filters)) return records;
  const f = resolve(filters);
  const needle = f.name.trim().toLowerCase();

  return records.filter((r) => {
    if (needle && !(r.name ?? "").toLowerCase().includes(needle)) return false;
    if (f.category !== ALL && r.category !== f.category) return false;
    if (f.position !== ALL && r.position !== f.position) return false;
    if (f.competition !== ALL && r.competition !== f.competition) return false;
    if (f.year !== ALL && r.year !== f.year) return false;
    return true;
  });
}

function compareNullable<T extends string | number>(a: T | null, b: T | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : a > b ? 1 : 0;
}

// Display order: year, then name; missing values last.
export function sortForDisplay<T extends PlayerRecord>(records: readonly T[]): T[] {
  return [...records].sort((a, b) => compareNullable(a.year, b.year) || compareNullable(a.name, b.name));
}

// Distinct values present in the collection, sorted, for filter choices.
export function filterOptions(records: readonly PlayerRecord[], field: "year"): number[];
export function filterOptions(records: readonly PlayerRecord[], field: Exclude<FilterField, "year">): string[];
export function filterOptions(records: readonly PlayerRecord[], field: FilterField): (string | number)[] {
  const seen = new Set<string | number>();
  for (const r of records) {
    const v = r[field];
    if (v !== null) seen.add(v);
  }
  return [...seen].sort(compareNullable);
}
