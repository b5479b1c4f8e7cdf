import Papa, { type ParseError } from "papaparse";
import type { RawRow } from "@/lib/domain/types";

export type ParseReport = {
  header: string[];
  rows: RawRow[];
  errors: { type: ParseError["type"]; row: number; message: string }[];
  rowCount: number;
};

// Comma-delimited UTF-8 text with a header row. Values stay strings; the normalizer coerces them.
export function parseCsvText(text: string): ParseReport {
  const res = Papa.parse<Record<string, string>>(text.replace(/^\uFEFF/, ""), {
    header: true,
    delimiter: ",",
    dynamicTyping: false,
    skipEmptyLines: "greedy",
  });

  return {
    header: res.meta.fields ?? [],
    rows: res.data,
    errors: res.errors.map((e) => ({ type: e.type, row: e.row ?? -1, message: e.message })),
    rowCount: res.data.length,
  };
}

// Errors that mean the text is not well-formed CSV (unbalanced quotes, undetectable delimiter).
// Short or long rows are not among them: missing cells become missing values.
export function structuralErrors(report: ParseReport): string[] {
  return report.errors
    .filter((e) => e.type === "Quotes" || e.type === "Delimiter")
    .map((e) => (e.row >= 0 ? `row ${e.row + 1}: ${e.message}` : e.message));
}
