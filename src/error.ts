/** Thrown when a value does not follow its type's grammar or constraints */
export class InvalidValueError extends Error {
  constructor(
    /** The offending text (or a rendering of the offending native value) */
    public readonly text: string,
    /** Value type that was attempted, e.g. 'date-time' */
    public readonly valueType: string,
    public readonly reason?: string,
    options?: ErrorOptions,
  ) {
    super(
      reason === undefined
        ? `Invalid ${valueType} value: ${JSON.stringify(text)}`
        : `Invalid ${valueType} value: ${JSON.stringify(text)} (${reason})`,
      options,
    );
    this.name = 'InvalidValueError';
  }
}

/** Render an arbitrary native value for an error message */
export function describeValue(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
