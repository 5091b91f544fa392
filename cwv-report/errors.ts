export type CwvErrorKind = 'input' | 'transient-io' | 'persistence';

export class CwvReportError extends Error {
  readonly kind: CwvErrorKind;

  constructor(kind: CwvErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Bad metric ids, bad values, malformed API payloads, history files or config. */
export class InputError extends CwvReportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('input', message, options);
  }
}

/** Network failure or non-2xx from CrUX, a sitemap or Slack. */
export class TransientIOError extends CwvReportError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('transient-io', message, options);
    this.status = status;
  }
}

export class PersistenceError extends CwvReportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('persistence', message, options);
  }
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeError(error: unknown): string {
  if (error instanceof CwvReportError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
