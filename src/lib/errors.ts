export type TelemetryParseErrorKind = 'InvalidFormat' | 'MissingHeaders' | 'NoValidData';

const DEFAULT_MESSAGES: Record<TelemetryParseErrorKind, string> = {
  InvalidFormat: 'Invalid CSV format',
  MissingHeaders: 'CSV headers not found',
  NoValidData: 'No valid telemetry data found',
};

/**
 * Fatal parse failure. The message is meant to be shown to the user as-is.
 */
export class TelemetryParseError extends Error {
  readonly kind: TelemetryParseErrorKind;

  constructor(kind: TelemetryParseErrorKind, message: string = DEFAULT_MESSAGES[kind]) {
    super(message);
    this.name = 'TelemetryParseError';
    this.kind = kind;
  }
}

// Caller error: an operation was handed input it cannot produce a meaningful answer for
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export function isTelemetryParseError(value: unknown): value is TelemetryParseError {
  return value instanceof TelemetryParseError;
}
