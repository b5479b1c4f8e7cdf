import { loadConfig } from "@/lib/config";
import { getConnection } from "@/lib/store";
import { createRosterStore, type RosterStore } from "./roster-store";

export const DEFAULT_SESSION = "default";
const MAX_SESSIONS = 200;

const sessions = new Map<string, RosterStore>();

// One roster state per viewer session; all of them share the process-wide store connection.
export function getRosterSession(id: string = DEFAULT_SESSION): RosterStore {
  const existing = sessions.get(id);
  if (existing) return existing;

  const config = loadConfig();
  const session = createRosterStore({ config, connection: getConnection(config) });
  if (sessions.size >= MAX_SESSIONS) {
    const oldest = sessions.keys().next();
    if (!oldest.done) sessions.delete(oldest.value);
  }
  sessions.set(id, session);
  return session;
}

export function resetSessions(): void {
  sessions.clear();
}
