/** Raised when an untyped operation request fails validation. */
export class CurveParameterError extends Error {
  constructor(
    message: string,
    /** Messages keyed by dotted field path, e.g. `params.windowSize` */
    public readonly fields: Readonly<Record<string, string[]>>,
  ) {
    super(message);
    this.name = 'CurveParameterError';
  }
}
