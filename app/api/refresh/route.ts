import { errorResponse, sessionFor } from "@/lib/server/http";

// Drops the session's cached copy and reads both tabs again.
export async function POST(req: Request) {
  try {
    const session = sessionFor(req);
    await session.getState().load({ force: true });
    const { loaded, players, titles, errors, warnings } = session.getState();
    return Response.json({ ok: loaded, players: players.length, titles: titles.length, errors, warnings });
  } catch (e) {
    return errorResponse(e);
  }
}

export const dynamic = "force-dynamic";
