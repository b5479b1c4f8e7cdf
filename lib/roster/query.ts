import { z } from "zod";
import { InputValidationError } from "@/lib/store/errors";
import { ALL } from "./config";
import { NO_FILTERS, type PlayerFilters } from "./filter";

const choice = z
  .string()
  .optional()
  .transform((s) => (s === undefined || s.trim() === "" || s === ALL ? ALL : s));

const FiltersQuerySchema = z.object({
  name: z.string().optional().transform((s) => s?.trim() ?? ""),
  category: choice,
  position: choice,
  competition: choice,
  year: z
    .string()
    .optional()
    .transform((s) => (s === undefined || s.trim() === "" || s === ALL ? ALL : s.trim()))
    .pipe(z.union([z.literal(ALL), z.coerce.number().int()])),
});

// ?name=silva&category=Sub-20&year=2019 -> filters; absent or "*" means no filter.
export function filtersFromSearchParams(params: URLSearchParams): PlayerFilters {
  const raw: Record<string, string> = {};
  for (const k of ["name", "category", "position", "competition", "year"]) {
    const v = params.get(k);
    if (v !== null) raw[k] = v;
  }
  const parsed = FiltersQuerySchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputValidationError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  return { ...NO_FILTERS, ...parsed.data };
}
