/** A statement that cannot be rewritten at all. */
export class TranspileError extends Error {
  constructor(
    message: string,
    readonly snippet = "",
  ) {
    super(message);
    this.name = "TranspileError";
  }
}
