import { ALL } from "@/lib/roster/config";
import { filterTitles, groupTitlesByCategory, titleCategories } from "@/lib/roster/titles";
import { errorResponse, loadedSession, requireAdmin, sessionFor } from "@/lib/server/http";

export async function GET(req: Request) {
  try {
    const category = new URL(req.url).searchParams.get("category")?.trim() || ALL;
    const state = await loadedSession(req);
    const titles = filterTitles(
      state.titles.map((t, index) => ({ index, ...t })),
      category
    );
    return Response.json({
      ok: true,
      available: state.tabs.titles,
      titles,
      groups: groupTitlesByCategory(titles),
      categories: titleCategories(state.titles),
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
    const title = await sessionFor(req).getState().addTitle(body);
    return Response.json({ ok: true, title }, { status: 201 });
  } catch (e) {
    return errorResponse(e);
  }
}

export const dynamic = "force-dynamic";
