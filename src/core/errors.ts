export class CliError extends Error {
  constructor(message: string, public readonly causeError?: unknown) {
    super(message);
    this.name = "CliError";
  }
}

export class MissingVariableError extends CliError {
  constructor(public readonly variable: string) {
    super(`${variable} variable is not specified`);
    this.name = "MissingVariableError";
  }
}

export class EmptyValueError extends CliError {
  constructor(message: string) {
    super(message);
    this.name = "EmptyValueError";
  }
}

/** Raised when `--set` input does not fit the tracker's field schema. */
export class FieldSchemaError extends CliError {
  constructor(message: string, causeError?: unknown) {
    super(message, causeError);
    this.name = "FieldSchemaError";
  }
}

export class TrackerApiError extends CliError {
  constructor(message: string, public readonly status?: number, causeError?: unknown) {
    super(message, causeError);
    this.name = "TrackerApiError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
