// ---------------------------------------------------------------------------
// Error hierarchy for the Lending Desk service.
// Business outcomes (not found, no copies, ...) are result values, not errors;
// see `Result` in ./types.ts.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all Lending Desk errors.
 */
export class LendingDeskError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LendingDeskError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Storage errors ──────────────────────────────────────────────────────────

/**
 * Writing the library state to its store failed. The in-memory mutation that
 * preceded the save has already happened.
 */
export class PersistenceError extends LendingDeskError {
  public readonly location: string;

  constructor(location: string, reason: string, options?: ErrorOptions) {
    super(`Could not save library state to ${location}: ${reason}`, options);
    this.name = "PersistenceError";
    this.location = location;
  }
}

/** The store held content that could not be read as library state. */
export class MalformedStoreDataError extends LendingDeskError {
  public readonly location: string;

  constructor(location: string, reason: string, options?: ErrorOptions) {
    super(`Malformed library data in ${location}: ${reason}`, options);
    this.name = "MalformedStoreDataError";
    this.location = location;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends LendingDeskError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
