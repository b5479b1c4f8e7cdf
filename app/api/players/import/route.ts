import { errorResponse, requireAdmin, sessionFor } from "@/lib/server/http";

// Body: comma-delimited text with a header row.
export async function POST(req: Request) {
  const denied = requireAdmin(req);
  if (denied) return denied;
  try {
    const csv = await req.text();
    if (!csv.trim()) return Response.json({ ok: false, error: "Empty upload" }, { status: 400 });
    const added = await sessionFor(req).getState().importPlayers(csv);
    return Response.json({ ok: true, added });
  } catch (e) {
    return errorResponse(e);
  }
}

export const dynamic = "force-dynamic";
