import { createStore } from "zustand/vanilla";
import type { z } from "zod";
import type { RosterConfig } from "@/lib/config";
import { toCsv } from "@/lib/csv/export";
import type { PlayerRecord, TitleRecord } from "@/lib/domain/types";
import { normalizeNameKey } from "@/lib/ingest/aliases";
import { hasCanonicalLayout, missingColumns, normalizeRecords } from "@/lib/ingest/normalize";
import { parseCsvText, structuralErrors } from "@/lib/ingest/parse";
import {
  PLAYER_COLUMNS,
  PlayerInputSchema,
  TITLE_COLUMNS,
  TITLE_SCHEMA,
  TitleInputSchema,
  playerSchema,
  type RecordSchema,
} from "@/lib/ingest/schemas";
import { logger } from "@/lib/log";
import { commitRecords, importBatch, removeAt } from "@/lib/roster/sync";
import type { StoreConnection } from "@/lib/store/connection";
import {
  DuplicateRecordError,
  HeaderLayoutError,
  InputValidationError,
  StoreConnectionError,
  TabNotFoundError,
  errorMessage,
} from "@/lib/store/errors";
import type { RecordStore } from "@/lib/store/types";

const log = logger("roster");

type TabKey = "players" | "titles";

export type RosterDeps = {
  connection: Pick<StoreConnection, "get">;
  config: Pick<RosterConfig, "PLAYERS_TAB" | "TITLES_TAB" | "DEFAULT_CATEGORY">;
};

export type RosterState = {
  loaded: boolean;
  players: PlayerRecord[];
  titles: TitleRecord[];
  tabs: Record<TabKey, boolean>; // false when the tab is absent from the store
  headers: Record<TabKey, string[]>; // header row as read
  errors: string[];
  warnings: string[];
  load: (opts?: { force?: boolean }) => Promise<void>;
  importPlayers: (csv: string) => Promise<number>;
  addPlayer: (input: unknown) => Promise<PlayerRecord>;
  removePlayer: (index: number) => Promise<PlayerRecord>;
  addTitle: (input: unknown) => Promise<TitleRecord>;
  removeTitle: (index: number) => Promise<TitleRecord>;
  exportPlayers: () => string;
};

type TabRead<R> = { records: R[]; header: string[]; available: boolean; error?: string; warning?: string };

async function readTab<R>(store: RecordStore, tab: string, schema: RecordSchema<R>): Promise<TabRead<R>> {
  try {
    const snap = await store.readTable(tab);
    const missing = snap.header.length > 0 ? missingColumns(snap.header, schema) : [];
    let warning: string | undefined;
    if (missing.length > 0) warning = `Tab '${tab}' lacks columns: ${missing.join(", ")}`;
    else if (snap.header.length > 0 && !hasCanonicalLayout(snap.header, schema.columns)) {
      warning = `Tab '${tab}' columns are not in the order ${schema.columns.join(", ")}`;
    }
    return { records: normalizeRecords(snap.rows, schema), header: snap.header, available: true, warning };
  } catch (e) {
    if (e instanceof TabNotFoundError) {
      return { records: [], header: [], available: false, error: `Tab '${tab}' not found in the spreadsheet` };
    }
    return { records: [], header: [], available: true, error: `Could not process tab '${tab}': ${errorMessage(e)}` };
  }
}

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InputValidationError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  return parsed.data;
}

export function createRosterStore({ connection, config }: RosterDeps) {
  const players = playerSchema(config.DEFAULT_CATEGORY);

  return createStore<RosterState>((set, get) => {
    const tabName = (key: TabKey) => (key === "players" ? config.PLAYERS_TAB : config.TITLES_TAB);

    // Store handle for a write against `key`, loading first if this session has not yet.
    // Appends are positional, so they also need the header in canonical order.
    const writable = async (key: TabKey, op: "append" | "delete"): Promise<RecordStore> => {
      if (!get().loaded) await get().load();
      const s = get();
      if (!s.loaded) throw new StoreConnectionError(s.errors[0] ?? "Backing store unavailable");
      if (!s.tabs[key]) throw new TabNotFoundError(tabName(key));
      const columns: readonly string[] = key === "players" ? PLAYER_COLUMNS : TITLE_COLUMNS;
      if (op === "append" && !hasCanonicalLayout(s.headers[key], columns)) {
        throw new HeaderLayoutError(tabName(key), columns, s.headers[key]);
      }
      return connection.get();
    };

    return {
      loaded: false,
      players: [],
      titles: [],
      tabs: { players: false, titles: false },
      headers: { players: [], titles: [] },
      errors: [],
      warnings: [],

      load: async ({ force = false } = {}) => {
        if (get().loaded && !force) return;
        let store: RecordStore;
        try {
          store = await connection.get();
        } catch (e) {
          const message = `Connection error: ${errorMessage(e)}`;
          log.error(message);
          set({
            loaded: false,
            players: [],
            titles: [],
            tabs: { players: false, titles: false },
            headers: { players: [], titles: [] },
            errors: [message],
            warnings: [],
          });
          return;
        }

        const [p, t] = await Promise.all([
          readTab(store, config.PLAYERS_TAB, players),
          readTab(store, config.TITLES_TAB, TITLE_SCHEMA),
        ]);
        const errors = [p.error, t.error].filter((m): m is string => m !== undefined);
        const warnings = [p.warning, t.warning].filter((m): m is string => m !== undefined);
        for (const m of errors) log.error(m);
        for (const m of warnings) log.warn(m);

        set({
          loaded: true,
          players: p.records,
          titles: t.records,
          tabs: { players: p.available, titles: t.available },
          headers: { players: p.header, titles: t.header },
          errors,
          warnings,
        });
      },

      importPlayers: async (csv) => {
        const store = await writable("players", "append");
        const report = parseCsvText(csv);
        const broken = structuralErrors(report);
        if (broken.length > 0) throw new InputValidationError(broken);
        const res = await importBatch(get().players, report.header, report.rows, players, {
          publish: (records) => set({ players: records }),
          append: (rows) => store.appendRows(config.PLAYERS_TAB, rows),
        });
        log.info(`${res.added} players added to '${config.PLAYERS_TAB}'`);
        await get().load({ force: true });
        return res.added;
      },

      addPlayer: async (input) => {
        const data = parseInput(PlayerInputSchema, input);
        const record: PlayerRecord = { ...data, category: data.category ?? config.DEFAULT_CATEGORY };
        const store = await writable("players", "append");

        const key = normalizeNameKey(record.name ?? "");
        const dup = get().players.some((p) => p.year === record.year && p.name !== null && normalizeNameKey(p.name) === key);
        if (dup) throw new DuplicateRecordError(`${data.name} is already listed for ${data.year}`);

        await commitRecords(get().players, [record], players, {
          publish: (records) => set({ players: records }),
          append: (rows) => store.appendRows(config.PLAYERS_TAB, rows),
        });
        await get().load({ force: true });
        return record;
      },

      removePlayer: async (index) => {
        const store = await writable("players", "delete");
        const removed = await removeAt(get().players, index, (position) => store.deleteRow(config.PLAYERS_TAB, position));
        log.info(`removed ${removed.name ?? "(unnamed)"} from '${config.PLAYERS_TAB}'`);
        await get().load({ force: true });
        return removed;
      },

      addTitle: async (input) => {
        const record: TitleRecord = parseInput(TitleInputSchema, input);
        const store = await writable("titles", "append");
        await commitRecords(get().titles, [record], TITLE_SCHEMA, {
          publish: (records) => set({ titles: records }),
          append: (rows) => store.appendRows(config.TITLES_TAB, rows),
        });
        await get().load({ force: true });
        return record;
      },

      removeTitle: async (index) => {
        const store = await writable("titles", "delete");
        const removed = await removeAt(get().titles, index, (position) => store.deleteRow(config.TITLES_TAB, position));
        await get().load({ force: true });
        return removed;
      },

      exportPlayers: () => toCsv(get().players, PLAYER_COLUMNS),
    };
  });
}

export type RosterStore = ReturnType<typeof createRosterStore>;
