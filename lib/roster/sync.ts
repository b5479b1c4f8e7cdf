import type { CellValue, RawRow } from "@/lib/domain/types";
import { missingColumns, normalizeRecords } from "@/lib/ingest/normalize";
import type { RecordSchema } from "@/lib/ingest/schemas";
import { BatchValidationError, RecordNotFoundError, RosterError, StoreWriteError, errorMessage } from "@/lib/store/errors";
import { positionOf } from "@/lib/store/types";

// Where committed records go: the session collection first, then the backing store.
export type SyncSink<R> = {
  publish: (records: R[]) => void;
  append: (rows: CellValue[][]) => Promise<void>;
};

export type SyncResult<R> = {
  added: number;
  records: R[];
};

// Positional rows in canonical column order; missing values become empty cells.
export function toStoreRows<R>(records: readonly R[], schema: RecordSchema<R>): CellValue[][] {
  return records.map((r) =>
    schema.columns.map((col) => {
      const v = r[col];
      return typeof v === "string" || typeof v === "number" ? v : "";
    })
  );
}

/**
 * Appends already-normalized records. The session collection is updated before the store write;
 * if the write fails that update stays in place and the failure is raised as StoreWriteError.
 */
export async function commitRecords<R>(
  current: readonly R[],
  batch: readonly R[],
  schema: RecordSchema<R>,
  sink: SyncSink<R>
): Promise<SyncResult<R>> {
  const records = [...current, ...batch];
  sink.publish(records);
  if (batch.length > 0) {
    try {
      await sink.append(toStoreRows(batch, schema));
    } catch (e) {
      if (e instanceof RosterError) throw e;
      throw new StoreWriteError(`Could not write ${batch.length} ${schema.kind} rows: ${errorMessage(e)}`, { cause: e });
    }
  }
  return { added: batch.length, records };
}

// Bulk upload: the header must carry every required column or nothing is accepted.
export async function importBatch<R>(
  current: readonly R[],
  header: readonly string[],
  rows: readonly RawRow[],
  schema: RecordSchema<R>,
  sink: SyncSink<R>
): Promise<SyncResult<R>> {
  const missing = missingColumns(header, schema);
  if (missing.length > 0) throw new BatchValidationError(missing);
  return commitRecords(current, normalizeRecords(rows, schema), schema, sink);
}

// Deletes the record at `index` of the collection, which is row `index + 2` of the store.
export async function removeAt<R>(
  records: readonly R[],
  index: number,
  remove: (position: number) => Promise<void>
): Promise<R> {
  if (!Number.isInteger(index) || index < 0 || index >= records.length) {
    throw new RecordNotFoundError(`No record at index ${index}`);
  }
  const record = records[index];
  try {
    await remove(positionOf(index));
  } catch (e) {
    if (e instanceof RosterError) throw e;
    throw new StoreWriteError(`Could not delete row ${positionOf(index)}: ${errorMessage(e)}`, { cause: e });
  }
  return record;
}
