// Taxonomie des erreurs du moniteur

export type MonitorErrorKind = 'fetch' | 'extraction' | 'persistence' | 'notification';

export class MonitorError extends Error {
  readonly kind: MonitorErrorKind;

  constructor(kind: MonitorErrorKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = new.target.name;
    this.kind = kind;
  }
}

/**
 * Réseau, timeout ou statut HTTP non 2xx
 */
export class FetchError extends MonitorError {
  readonly url: string;
  readonly status?: number;
  readonly timedOut: boolean;

  constructor(url: string, message: string, options: { status?: number; timedOut?: boolean; cause?: unknown } = {}) {
    super('fetch', message, options.cause);
    this.url = url;
    this.status = options.status;
    this.timedOut = options.timedOut ?? false;
  }
}

export class ExtractionError extends MonitorError {
  readonly source: string;

  constructor(source: string, message: string, cause?: unknown) {
    super('extraction', message, cause);
    this.source = source;
  }
}

export class PersistenceError extends MonitorError {
  readonly filePath: string;

  constructor(filePath: string, message: string, cause?: unknown) {
    super('persistence', message, cause);
    this.filePath = filePath;
  }
}

export class NotificationError extends MonitorError {
  readonly status?: number;

  constructor(message: string, status?: number, cause?: unknown) {
    super('notification', message, cause);
    this.status = status;
  }
}

/**
 * Message lisible pour n'importe quelle valeur levée
 */
export function describeError(error: unknown): string {
  if (error instanceof MonitorError && error.cause instanceof Error) {
    return `${error.message} (${error.cause.message})`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
