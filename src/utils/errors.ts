/**
 * Process exit codes. Scripts depend on these values; never renumber them.
 */
export const ExitCode = {
  SUCCESS: 0,
  GENERAL: 1,
  PRIVILEGE_REQUIRED: 2,
  NO_SERVICE_MANAGER: 3,
  NO_PACKAGE_MANAGER: 4,
  INVALID_INTERVAL: 8,
  NO_CONNECTIVITY: 9,
  RELAY_NOT_INSTALLED: 10,
  CONFIG_NOT_FOUND: 20,
  CONFIG_READ_FAILED: 22,
  CONFIG_WRITE_FAILED: 23,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export type FatalErrorKind =
  | 'privilege-required'
  | 'no-service-manager'
  | 'no-package-manager'
  | 'invalid-interval'
  | 'no-connectivity'
  | 'relay-not-installed'
  | 'config-not-found'
  | 'config-read'
  | 'config-write';

const EXIT_CODES: Record<FatalErrorKind, ExitCodeValue> = {
  'privilege-required': ExitCode.PRIVILEGE_REQUIRED,
  'no-service-manager': ExitCode.NO_SERVICE_MANAGER,
  'no-package-manager': ExitCode.NO_PACKAGE_MANAGER,
  'invalid-interval': ExitCode.INVALID_INTERVAL,
  'no-connectivity': ExitCode.NO_CONNECTIVITY,
  'relay-not-installed': ExitCode.RELAY_NOT_INSTALLED,
  'config-not-found': ExitCode.CONFIG_NOT_FOUND,
  'config-read': ExitCode.CONFIG_READ_FAILED,
  'config-write': ExitCode.CONFIG_WRITE_FAILED,
};

/**
 * A condition that ends the process with a dedicated exit code
 */
export class FatalError extends Error {
  readonly kind: FatalErrorKind;
  readonly exitCode: ExitCodeValue;

  constructor(kind: FatalErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalError';
    this.kind = kind;
    this.exitCode = EXIT_CODES[kind];
  }
}

export function isFatalError(error: unknown): error is FatalError {
  return error instanceof FatalError;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
