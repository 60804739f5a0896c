import type { CanonicalColumn } from '@klinecheck/schemas';

export type KlineErrorCode =
  | 'INVALID_ARGUMENT'
  | 'TRANSPORT'
  | 'REMOTE'
  | 'DATA_INTEGRITY'
  | 'INPUT'
  | 'SCHEMA';

/**
 * Base class for every failure the fetch and reconcile pipeline raises.
 * Errors propagate unchanged; only the entry point turns them into exit codes.
 */
export abstract class KlineCheckError extends Error {
  abstract readonly code: KlineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A caller-supplied parameter violates a precondition. Raised before any I/O. */
export class InvalidArgumentError extends KlineCheckError {
  readonly code = 'INVALID_ARGUMENT';
}

/** Network-layer failure: DNS, refused or reset connection, timeout. */
export class TransportError extends KlineCheckError {
  readonly code = 'TRANSPORT';

  constructor(
    public readonly url: string,
    cause: unknown
  ) {
    super(`Request to ${url} failed: ${causeMessage(cause)}`, { cause });
  }
}

/** Preview length kept from an error response body */
export const BODY_PREVIEW_LENGTH = 500;

/** The endpoint answered, but not with a usable payload. */
export class RemoteError extends KlineCheckError {
  readonly code = 'REMOTE';
  readonly bodyPreview: string;

  constructor(
    public readonly status: number,
    body: string,
    detail = `HTTP ${status}`
  ) {
    const bodyPreview = body.slice(0, BODY_PREVIEW_LENGTH);
    super(`Remote error (${detail}): ${bodyPreview}`);
    this.bodyPreview = bodyPreview;
  }
}

/** Per-column count of unparseable cells (or duplicate keys under `open_time`) */
export type DefectCounts = Partial<Record<CanonicalColumn, number>>;

/** Normalization found cells that could not be parsed. The whole batch is rejected. */
export class DataIntegrityError extends KlineCheckError {
  readonly code = 'DATA_INTEGRITY';

  constructor(
    public readonly defects: DefectCounts,
    context?: string
  ) {
    const summary = Object.entries(defects)
      .map(([column, count]) => `${column}=${count}`)
      .join(', ');
    super(`Malformed kline data${context ? ` for ${context}` : ''}: ${summary}`);
  }
}

/** An artifact could not be read or decoded. */
export class InputError extends KlineCheckError {
  readonly code = 'INPUT';

  constructor(
    public readonly path: string,
    detail: string,
    cause?: unknown
  ) {
    super(`Cannot load ${path}: ${detail}`, { cause });
  }
}

/** An artifact was readable but does not match the expected schema. */
export class SchemaError extends KlineCheckError {
  readonly code = 'SCHEMA';

  constructor(
    public readonly path: string,
    detail: string,
    public readonly line?: number
  ) {
    super(`Schema mismatch in ${path}${line !== undefined ? ` (line ${line})` : ''}: ${detail}`);
  }
}

function causeMessage(cause: unknown): string {
  if (cause instanceof Error) {
    // fetch wraps socket errors one level down
    const inner = cause.cause instanceof Error ? `: ${cause.cause.message}` : '';
    return `${cause.message}${inner}`;
  }
  return String(cause);
}

/**
 * Flatten an error into log bindings
 */
export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof KlineCheckError) {
    const { name, code, message, stack: _stack, cause: _cause, ...fields } = err;
    return { name, code, message, ...fields };
  }
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { message: String(err) };
}
