// Header aliases: the club's sheets use Portuguese headers, exports use the canonical names.
// Keys are already canonicalized (lower-case, no accents, spaces -> "_").

export const HEADER_ALIASES = new Map<string, string>([
  ["nome", "name"],
  ["jogador", "name"],
  ["ano", "year"],
  ["posicao", "position"],
  ["competicao", "competition"],
  ["gols", "goals"],
  ["minutagem", "minutes"],
  ["minutos", "minutes"],
  ["categoria", "category"],
  ["titulo", "title"],
]);

function stripAccents(s: string): string {
  return s.normalize("NFKD").replace(/[\u0300-\u036f]/g, "");
}

export function canonicalKey(key: string): string {
  const base = stripAccents(key).trim().toLowerCase().replace(/\s+/g, "_");
  return HEADER_ALIASES.get(base) ?? base;
}

export function normalizeNameKey(name: string): string {
  // Uppercase, remove periods and extra spaces, collapse whitespace
  return stripAccents(name).toUpperCase().replace(/\./g, "").replace(/\s+/g, " ").trim();
}
