import { z } from "zod";
import {
  DEFAULT_CATEGORY,
  DEFAULT_CONNECTION_TTL_MS,
  DEFAULT_PLAYERS_TAB,
  DEFAULT_TITLES_TAB,
} from "@/lib/roster/config";

const optStr = z
  .string()
  .optional()
  .transform((s) => (s === undefined || s.trim() === "" ? undefined : s));

export const ConfigSchema = z
  .object({
    ROSTER_BACKEND: z.enum(["sheets", "sqlite", "memory"]).default("memory"),
    GOOGLE_SERVICE_ACCOUNT_JSON: optStr,
    GOOGLE_SHEET_URL: optStr,
    SQLITE_PATH: z.string().min(1).default("data/roster.db"),
    PLAYERS_TAB: z.string().min(1).default(DEFAULT_PLAYERS_TAB),
    TITLES_TAB: z.string().min(1).default(DEFAULT_TITLES_TAB),
    DEFAULT_CATEGORY: z.string().min(1).default(DEFAULT_CATEGORY),
    CONNECTION_TTL_MS: z.coerce.number().int().positive().default(DEFAULT_CONNECTION_TTL_MS),
    ADMIN_PASSWORD: optStr,
  })
  .superRefine((c, ctx) => {
    if (c.ROSTER_BACKEND !== "sheets") return;
    if (!c.GOOGLE_SERVICE_ACCOUNT_JSON) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["GOOGLE_SERVICE_ACCOUNT_JSON"], message: "required for the sheets backend" });
    }
    if (!c.GOOGLE_SHEET_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["GOOGLE_SHEET_URL"], message: "required for the sheets backend" });
    }
  });

export type RosterConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): RosterConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(
      "Invalid configuration: " + parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
    );
  }
  return parsed.data;
}
