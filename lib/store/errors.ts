export class RosterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Backing store unreachable or misconfigured.
export class StoreConnectionError extends RosterError {}

export class TabNotFoundError extends RosterError {
  readonly tab: string;
  constructor(tab: string) {
    super(`Tab '${tab}' not found`);
    this.tab = tab;
  }
}

// The tab's header is not the canonical columns in canonical order; positional appends would misalign.
export class HeaderLayoutError extends RosterError {
  readonly tab: string;
  readonly expected: string[];
  constructor(tab: string, expected: readonly string[], found: readonly string[]) {
    super(`Tab '${tab}' header must be: ${expected.join(", ")} (found: ${found.join(", ") || "none"})`);
    this.tab = tab;
    this.expected = [...expected];
  }
}

// Append or delete failed. In-memory state is not rolled back.
export class StoreWriteError extends RosterError {}

export class BatchValidationError extends RosterError {
  readonly missing: string[];
  constructor(missing: string[]) {
    super(`Missing columns: ${missing.join(", ")}`);
    this.missing = missing;
  }
}

export class InputValidationError extends RosterError {
  readonly issues: string[];
  constructor(issues: string[]) {
    super(`Invalid input: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class DuplicateRecordError extends RosterError {}

export class RecordNotFoundError extends RosterError {}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
