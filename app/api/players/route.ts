import { COMPETITIONS, POSITIONS } from "@/lib/roster/config";
import { filterOptions, filterPlayers, sortForDisplay } from "@/lib/roster/filter";
import { filtersFromSearchParams } from "@/lib/roster/query";
import { summarize } from "@/lib/roster/summary";
import { errorResponse, loadedSession, requireAdmin, sessionFor } from "@/lib/server/http";

export async function GET(req: Request) {
  try {
    const filters = filtersFromSearchParams(new URL(req.url).searchParams);
    const state = await loadedSession(req);
    // index = position in the session collection, used for deletes
    const indexed = state.players.map((p, index) => ({ index, ...p }));
    const filtered = filterPlayers(indexed, filters);
    return Response.json({
      ok: true,
      available: state.tabs.players,
      players: sortForDisplay(filtered),
      summary: summarize(filtered),
      options: {
        categories: filterOptions(state.players, "category"),
        positions: filterOptions(state.players, "position"),
        competitions: filterOptions(state.players, "competition"),
        years: filterOptions(state.players, "year"),
      },
      suggestions: { positions: POSITIONS, competitions: COMPETITIONS },
      errors: state.errors,
      warnings: state.warnings,
    });
  } catch (e) {
    return errorResponse(e);
  }
}

export async function POST(req: Request) {
  const denied = requireAdmin(req);
  if (denied) return denied;
  try {
    const body: unknown = await req.json();
    const player = await sessionFor(req).getState().addPlayer(body);
    return Response.json({ ok: true, player }, { status: 201 });
  } catch (e) {
    return errorResponse(e);
  }
}

export const dynamic = "force-dynamic";
