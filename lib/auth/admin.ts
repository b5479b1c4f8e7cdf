import type { RosterConfig } from "@/lib/config";

export const ADMIN_HEADER = "x-admin-password";

// Shared secret, exact match. With no password configured nobody is admin.
export function isAdmin(password: string | null | undefined, config: Pick<RosterConfig, "ADMIN_PASSWORD">): boolean {
  if (!config.ADMIN_PASSWORD || !password) return false;
  return password === config.ADMIN_PASSWORD;
}

export function isAdminRequest(req: Request, config: Pick<RosterConfig, "ADMIN_PASSWORD">): boolean {
  return isAdmin(req.headers.get(ADMIN_HEADER), config);
}
