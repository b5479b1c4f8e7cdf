// Domain models for canonical roster records.
// `null` is the missing marker: the column was absent or its value could not be read.

export type PlayerRecord = {
  name: string | null;
  year: number | null; // call-up year
  position: string | null;
  competition: string | null;
  goals: number | null;
  minutes: number | null;
  category: string | null; // age group, e.g. "Sub-20"
};

export type TitleRecord = {
  category: string | null;
  title: string | null;
  year: number | null; // absent on tabs written with the older two-column layout
};

export type RecordKind = "players" | "titles";

// A row as the backing store hands it over: header cell -> raw value.
export type RawRow = Record<string, unknown>;

// A positional value ready to be appended to the backing store.
export type CellValue = string | number;

export type TableSnapshot = {
  header: string[];
  rows: RawRow[];
};

export type RosterSummary = {
  callUps: number;
  goals: number;
  minutes: number;
  byYear: { year: number; count: number }[];
  byCompetition: { competition: string; count: number }[];
};

export type TitleGroup = {
  category: string;
  titles: string[];
};
