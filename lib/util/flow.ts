/**
 * An error that is expected, and should be reported to the user without a stack trace
 */
export class SimpleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SimpleError';
  }
}

export type FailureKind =
  | 'key-derivation'
  | 'corrupt-archive'
  | 'install'
  | 'pack'
  | 'remove'
  | 'transport';

const EXIT_CODES: Record<FailureKind, number> = {
  'key-derivation': 2,
  'corrupt-archive': 3,
  'install': 4,
  'pack': 5,
  'remove': 6,
  'transport': 7,
};

/**
 * A failure that aborts a depcache run
 *
 * The `kind` determines the process exit code, so scripts can tell
 * a broken cache entry from a broken install.
 */
export class DepcacheError extends SimpleError {
  constructor(public readonly kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DepcacheError';
  }

  public get exitCode(): number {
    return EXIT_CODES[this.kind];
  }
}

export function isDepcacheError(e: unknown, kind?: FailureKind): e is DepcacheError {
  return e instanceof DepcacheError && (kind === undefined || e.kind === kind);
}
