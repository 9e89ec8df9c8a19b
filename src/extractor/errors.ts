/**
 * Raised when the header violates the shape the generator guarantees
 * (members before their class, a method without receiver, an unresolved
 * type). Aborts the whole extraction run.
 */
export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExtractionError";
  }
}
