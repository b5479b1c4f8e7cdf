/**
 * Serializes records to comma-delimited text: header row first, then one line per record,
 * columns in the given (canonical) order.
 */
export function toCsv<R>(records: readonly R[], columns: readonly (keyof R & string)[]): string {
  const csvRows: string[] = [];

  csvRows.push(columns.map(escapeCSVField).join(","));

  for (const record of records) {
    const values = columns.map((col) => formatCSVValue(record[col]));
    csvRows.push(values.map(escapeCSVField).join(","));
  }

  return csvRows.join("\n") + "\n";
}

/**
 * Formats a value for CSV export
 */
function formatCSVValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }

  if (typeof value === "number") {
    return value.toString();
  }

  return String(value);
}

/**
 * Escapes a field value for CSV format
 */
function escapeCSVField(value: string): string {
  if (!value) return "";

  // If the value contains comma, quote, or newline, wrap in quotes and escape quotes
  if (value.includes(",") || value.includes('"') || value.includes("\n") || value.includes("\r")) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}
