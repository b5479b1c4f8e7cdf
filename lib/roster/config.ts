export const DEFAULT_CATEGORY = "Sub-20";

// "No filter" choice for the exact-match filters.
export const ALL = "*" as const;
export type All = typeof ALL;

export const POSITIONS = ["Goleiro", "Lateral", "Zagueiro", "Volante", "Meia", "Atacante"] as const;
export const COMPETITIONS = ["Mundial", "Sul-Americano", "Outros"] as const;

export const DEFAULT_PLAYERS_TAB = "Jogadores";
export const DEFAULT_TITLES_TAB = "Titulos";
export const DEFAULT_CONNECTION_TTL_MS = 60 * 60 * 1000;
