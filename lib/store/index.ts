import type { RosterConfig } from "@/lib/config";
import { TITLE_COLUMNS, PLAYER_COLUMNS } from "@/lib/ingest/schemas";
import { StoreConnection } from "./connection";
import { StoreConnectionError } from "./errors";
import { MemoryStore } from "./memory";
import { connectSheets } from "./sheets";
import { SqliteStore } from "./sqlite";
import type { RecordStore } from "./types";

let memoryStore: MemoryStore | null = null;

// The in-process store backing ROSTER_BACKEND=memory; created with both tabs, empty.
export function sharedMemoryStore(config: Pick<RosterConfig, "PLAYERS_TAB" | "TITLES_TAB">): MemoryStore {
  if (!memoryStore) {
    memoryStore = new MemoryStore({
      [config.PLAYERS_TAB]: { header: [...PLAYER_COLUMNS] },
      [config.TITLES_TAB]: { header: [...TITLE_COLUMNS] },
    });
  }
  return memoryStore;
}

export async function openStore(config: RosterConfig): Promise<RecordStore> {
  switch (config.ROSTER_BACKEND) {
    case "sheets": {
      if (!config.GOOGLE_SERVICE_ACCOUNT_JSON || !config.GOOGLE_SHEET_URL) {
        throw new StoreConnectionError("Incomplete secrets: GOOGLE_SERVICE_ACCOUNT_JSON and GOOGLE_SHEET_URL are required");
      }
      return connectSheets(config.GOOGLE_SERVICE_ACCOUNT_JSON, config.GOOGLE_SHEET_URL);
    }
    case "sqlite": {
      const store = SqliteStore.open(config.SQLITE_PATH);
      store.ensureTable(config.PLAYERS_TAB, PLAYER_COLUMNS);
      store.ensureTable(config.TITLES_TAB, TITLE_COLUMNS);
      return store;
    }
    case "memory":
      return sharedMemoryStore(config);
  }
}

const connections = new Map<string, StoreConnection>();

function connectionKey(config: RosterConfig): string {
  return [config.ROSTER_BACKEND, config.GOOGLE_SHEET_URL ?? "", config.SQLITE_PATH].join("|");
}

// One connection per configured backend, shared by every session in the process.
export function getConnection(config: RosterConfig): StoreConnection {
  const key = connectionKey(config);
  let conn = connections.get(key);
  if (!conn) {
    conn = new StoreConnection(() => openStore(config), config.CONNECTION_TTL_MS);
    connections.set(key, conn);
  }
  return conn;
}

export function resetConnections(): void {
  connections.clear();
  memoryStore = null;
}
