/**
 * Popcast — Error Taxonomy
 *
 * Every failure the pipeline knows how to recover from has its own class,
 * tagged with a `kind` so it can be folded into a CycleFailure record.
 */

export type PopcastErrorKind =
  | 'source_fetch'
  | 'entry_parse'
  | 'image_resolution'
  | 'publish'
  | 'ledger_unavailable'
  | 'all_sources_failed'
  | 'timeout'
  | 'config';

export abstract class PopcastError extends Error {
  abstract readonly kind: PopcastErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SourceFetchError extends PopcastError {
  readonly kind = 'source_fetch' as const;
  readonly status?: number;

  constructor(
    readonly pageId: string,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, options);
    this.status = options?.status;
  }
}

export class EntryParseError extends PopcastError {
  readonly kind = 'entry_parse' as const;

  constructor(readonly pageId: string, message: string) {
    super(message);
  }
}

export class ImageResolutionError extends PopcastError {
  readonly kind = 'image_resolution' as const;

  constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class PublishError extends PopcastError {
  readonly kind = 'publish' as const;
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

export class LedgerUnavailableError extends PopcastError {
  readonly kind = 'ledger_unavailable' as const;
}

export class AllSourcesFailedError extends PopcastError {
  readonly kind = 'all_sources_failed' as const;

  constructor(readonly pageCount: number) {
    super(`All ${pageCount} catalog pages failed`);
  }
}

export class TimeoutError extends PopcastError {
  readonly kind = 'timeout' as const;

  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

export class ConfigError extends PopcastError {
  readonly kind = 'config' as const;

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}
