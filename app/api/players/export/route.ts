import { errorResponse, loadedSession } from "@/lib/server/http";

export async function GET(req: Request) {
  try {
    const state = await loadedSession(req);
    return new Response(state.exportPlayers(), {
      status: 200,
      headers: {
        "Content-Type": "text/csv; charset=utf-8",
        "Content-Disposition": 'attachment; filename="jogadores_convocados.csv"',
      },
    });
  } catch (e) {
    return errorResponse(e);
  }
}

export const dynamic = "force-dynamic";
