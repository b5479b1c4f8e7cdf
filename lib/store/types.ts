import type { CellValue, TableSnapshot } from "@/lib/domain/types";

// Narrow contract over the durable store (a spreadsheet, or a local database file).
// Positions are 1-based and the header occupies position 1, so the first data row is position 2.
export interface RecordStore {
  readonly backend: "sheets" | "sqlite" | "memory";
  readTable(tab: string): Promise<TableSnapshot>;
  appendRows(tab: string, rows: CellValue[][]): Promise<void>;
  deleteRow(tab: string, position: number): Promise<void>;
  close?(): void;
}

export const FIRST_DATA_POSITION = 2;

export function positionOf(index: number): number {
  return index + FIRST_DATA_POSITION;
}
