import { isAdminRequest } from "@/lib/auth/admin";
import { loadConfig } from "@/lib/config";
import { logger } from "@/lib/log";
import { DEFAULT_SESSION, getRosterSession } from "@/lib/state/sessions";
import {
  BatchValidationError,
  DuplicateRecordError,
  HeaderLayoutError,
  InputValidationError,
  RecordNotFoundError,
  StoreConnectionError,
  StoreWriteError,
  TabNotFoundError,
  errorMessage,
} from "@/lib/store/errors";

const log = logger("api");

export const SESSION_HEADER = "x-session-id";

export function sessionFor(req: Request) {
  const id = req.headers.get(SESSION_HEADER)?.trim();
  return getRosterSession(id || DEFAULT_SESSION);
}

// Loaded roster state for the request's session.
export async function loadedSession(req: Request) {
  const session = sessionFor(req);
  await session.getState().load();
  return session.getState();
}

export function unauthorized(): Response {
  return Response.json({ ok: false, error: "Admin password required" }, { status: 401 });
}

export function requireAdmin(req: Request): Response | null {
  return isAdminRequest(req, loadConfig()) ? null : unauthorized();
}

export function parseIndex(raw: string): number | null {
  return /^\d+$/.test(raw) ? Number(raw) : null;
}

export function errorResponse(e: unknown): Response {
  const error = errorMessage(e);
  if (e instanceof BatchValidationError) {
    return Response.json({ ok: false, error, missing: e.missing }, { status: 422 });
  }
  if (e instanceof InputValidationError) {
    return Response.json({ ok: false, error, issues: e.issues }, { status: 400 });
  }
  if (e instanceof SyntaxError) return Response.json({ ok: false, error: `Malformed body: ${error}` }, { status: 400 });
  if (e instanceof RecordNotFoundError) return Response.json({ ok: false, error }, { status: 404 });
  if (e instanceof DuplicateRecordError) return Response.json({ ok: false, error }, { status: 409 });
  if (e instanceof TabNotFoundError) return Response.json({ ok: false, error }, { status: 409 });
  if (e instanceof HeaderLayoutError) {
    return Response.json({ ok: false, error, expected: e.expected }, { status: 409 });
  }
  if (e instanceof StoreConnectionError || e instanceof StoreWriteError) {
    log.error(error);
    return Response.json({ ok: false, error }, { status: 502 });
  }
  log.error(error);
  return Response.json({ ok: false, error }, { status: 500 });
}
