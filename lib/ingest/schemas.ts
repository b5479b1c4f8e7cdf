import { z } from "zod";
import type { PlayerRecord, RecordKind, TitleRecord } from "@/lib/domain/types";
import { DEFAULT_CATEGORY } from "@/lib/roster/config";

// Canonical column order. Rows are appended to the backing store in exactly this order.
export const PLAYER_COLUMNS = [
  "name",
  "year",
  "position",
  "competition",
  "goals",
  "minutes",
  "category",
] as const satisfies readonly (keyof PlayerRecord)[];

export const TITLE_COLUMNS = ["category", "title", "year"] as const satisfies readonly (keyof TitleRecord)[];

export type RecordSchema<R> = {
  kind: RecordKind;
  columns: readonly (keyof R & string)[];
  // columns a bulk upload must carry in its header
  required: readonly (keyof R & string)[];
  // filled in when the column is absent or missing
  defaults: Partial<Record<keyof R & string, string | number>>;
  row: z.ZodType<R, z.ZodTypeDef, unknown>;
};

// Helpers

export function toInteger(value: unknown): number | null {
  if (typeof value === "number") return Number.isInteger(value) ? value : null;
  if (typeof value !== "string") return null;
  const s = value.trim();
  // decimal integers, optionally with a zero fraction ("2.0")
  if (!/^[+-]?\d+(\.0+)?$/.test(s)) return null;
  return Number(s);
}

export function toText(value: unknown): string | null {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

const optInt = z.unknown().transform(toInteger);
const optText = z.unknown().transform(toText);

// Row schemas after key canonicalization. They never reject: bad values become null.
export const PlayerRowSchema = z.object({
  name: optText,
  year: optInt,
  position: optText,
  competition: optText,
  goals: optInt,
  minutes: optInt,
  category: optText,
});

export const TitleRowSchema = z.object({
  category: optText,
  title: optText,
  year: optInt,
});

export function playerSchema(defaultCategory: string = DEFAULT_CATEGORY): RecordSchema<PlayerRecord> {
  return {
    kind: "players",
    columns: PLAYER_COLUMNS,
    required: PLAYER_COLUMNS,
    defaults: { category: defaultCategory },
    row: PlayerRowSchema,
  };
}

export const TITLE_SCHEMA: RecordSchema<TitleRecord> = {
  kind: "titles",
  columns: TITLE_COLUMNS,
  required: TITLE_COLUMNS,
  defaults: {},
  row: TitleRowSchema,
};

// Single-entry admin input

const reqStr = z
  .string()
  .transform((s) => s.trim())
  .pipe(z.string().min(1));

const count = z.coerce.number().int().nonnegative();

export const PlayerInputSchema = z.object({
  name: reqStr,
  year: z.coerce.number().int().min(1900).max(2100),
  position: reqStr,
  competition: reqStr,
  goals: count.default(0),
  minutes: count.default(0),
  category: reqStr.optional(),
});

export type PlayerInput = z.infer<typeof PlayerInputSchema>;

export const TitleInputSchema = z.object({
  title: reqStr,
  category: reqStr,
  year: z.coerce.number().int().min(1900).max(2100).nullable().default(null),
});

export type TitleInput = z.infer<typeof TitleInputSchema>;
