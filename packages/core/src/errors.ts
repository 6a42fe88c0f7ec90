export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'MISSING_CREDENTIALS'
  | 'MISSING_INPUT'
  | 'MISSING_TEMPLATE';

/**
 * Base error for everything docstruct reports on purpose.
 */
export class DocstructError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The service client rejected a credential or model name at bind time.
 */
export class ConfigurationError extends DocstructError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
  }
}

export class MissingCredentialsError extends DocstructError {
  constructor(message = 'No credentials found. Pass them with --api or list them in the key file.') {
    super('MISSING_CREDENTIALS', message);
  }
}

export class MissingInputError extends DocstructError {
  constructor(public readonly inputDir: string) {
    super('MISSING_INPUT', `Input directory '${inputDir}' does not exist or is not a directory.`);
  }
}

export class MissingTemplateError extends DocstructError {
  constructor(
    message = 'No JSON template supplied. Use --json-template <path> or enable --no-json-template.'
  ) {
    super('MISSING_TEMPLATE', message);
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
