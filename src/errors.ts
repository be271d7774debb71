export class InvalidParametersError extends Error {
  constructor(
    public readonly parameter: string,
    public readonly value: unknown,
    reason: string
  ) {
    super(`Invalid parameters: ${parameter} = ${String(value)} (${reason})`);
    this.name = 'InvalidParametersError';
  }
}

export function invalidParameter(
  parameter: string,
  value: unknown,
  reason: string
): InvalidParametersError {
  return new InvalidParametersError(parameter, value, reason);
}
