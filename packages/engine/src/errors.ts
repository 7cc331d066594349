/**
 * Raised at the engine boundary when a request cannot be served as asked.
 * No scoring work has happened when this is thrown.
 */
export class InvalidRequestError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'InvalidRequestError';
    this.issues = issues;
  }
}
