import type { RawRow } from "@/lib/domain/types";
import type { RecordSchema } from "./schemas";
import { canonicalKey } from "./aliases";

// Canonical keys of a header, blanks dropped, first occurrence wins.
export function normalizeHeader(keys: readonly string[]): string[] {
  const out: string[] = [];
  for (const key of keys) {
    const k = canonicalKey(key);
    if (k === "" || out.includes(k)) continue;
    out.push(k);
  }
  return out;
}

export function missingColumns<R>(header: readonly string[], schema: RecordSchema<R>): string[] {
  const present = new Set(normalizeHeader(header));
  return schema.required.filter((col) => !present.has(col));
}

// True when the header is exactly `columns`, in order (aliases allowed).
export function hasCanonicalLayout(header: readonly string[], columns: readonly string[]): boolean {
  const keys = normalizeHeader(header);
  return keys.length === columns.length && columns.every((col, i) => keys[i] === col);
}

export function normalizeRecord<R>(raw: RawRow, schema: RecordSchema<R>): R {
  const byKey = new Map<string, unknown>();
  for (const [key, value] of Object.entries(raw)) {
    const k = canonicalKey(key);
    if (k === "" || byKey.has(k)) continue; // trailing blank column
    byKey.set(k, value);
  }

  const projected: Record<string, unknown> = {};
  for (const col of schema.columns) {
    const value = byKey.get(col);
    projected[col] = value === undefined || value === null ? schema.defaults[col] ?? null : value;
  }
  return schema.row.parse(projected);
}

export function normalizeRecords<R>(rows: readonly RawRow[], schema: RecordSchema<R>): R[] {
  return rows.map((r) => normalizeRecord(r, schema));
}
