/**
 * SignalRadar — Error Taxonomy
 *
 * Per-item errors never escalate to per-source errors, and per-source
 * errors never escalate to a failed cycle. Only ConfigurationError is fatal;
 * a StoreUnavailable while loading the window ends the cycle with a
 * failed summary rather than a throw.
 */

export type RadarErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'MALFORMED_ITEM'
  | 'PERSISTENCE_CONFLICT'
  | 'STORE_UNAVAILABLE'
  | 'CONFIGURATION_ERROR';

export abstract class RadarError extends Error {
  abstract readonly code: RadarErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A whole adapter call failed: connection, HTTP status, auth or timeout.
 */
export class SourceUnavailable extends RadarError {
  readonly code = 'SOURCE_UNAVAILABLE' as const;

  constructor(
    readonly sourceName: string,
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Source "${sourceName}" unavailable: ${reason}`, options);
  }
}

/**
 * A single entry inside a source could not be normalized.
 */
export class MalformedItem extends RadarError {
  readonly code = 'MALFORMED_ITEM' as const;

  constructor(
    readonly sourceName: string,
    readonly reason: string,
    readonly entryId?: string
  ) {
    super(`Malformed entry from "${sourceName}"${entryId ? ` (${entryId})` : ''}: ${reason}`);
  }
}

/**
 * An insert lost a race against an identical item. Counted as a dedup outcome.
 */
export class PersistenceConflict extends RadarError {
  readonly code = 'PERSISTENCE_CONFLICT' as const;

  constructor(
    readonly externalId: string,
    readonly sourceKind: string
  ) {
    super(`Item ${sourceKind}:${externalId} already exists`);
  }
}

/**
 * A store call failed for any reason other than a unique-key conflict.
 */
export class StoreUnavailable extends RadarError {
  readonly code = 'STORE_UNAVAILABLE' as const;

  constructor(
    readonly operation: string,
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Store ${operation} failed: ${reason}`, options);
  }
}

export class ConfigurationError extends RadarError {
  readonly code = 'CONFIGURATION_ERROR' as const;

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
  }
}

/**
 * Wrap anything thrown by an adapter as SourceUnavailable.
 */
export function toSourceUnavailable(sourceName: string, error: unknown): SourceUnavailable {
  if (error instanceof SourceUnavailable) return error;
  const reason = error instanceof Error ? error.message : String(error);
  return new SourceUnavailable(sourceName, reason, { cause: error });
}
