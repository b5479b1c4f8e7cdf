import { z } from "zod";
import { isAdmin } from "@/lib/auth/admin";
import { loadConfig } from "@/lib/config";
import { errorResponse, unauthorized } from "@/lib/server/http";

const LoginSchema = z.object({ password: z.string() });

export async function POST(req: Request) {
  try {
    const parsed = LoginSchema.safeParse(await req.json());
    if (!parsed.success) return Response.json({ ok: false, error: "Expected { password }" }, { status: 400 });
    if (!isAdmin(parsed.data.password, loadConfig())) return unauthorized();
    return Response.json({ ok: true });
  } catch (e) {
    return errorResponse(e);
  }
}

export const dynamic = "force-dynamic";
