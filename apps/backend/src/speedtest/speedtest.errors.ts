/**
 * A precondition failure that ends the current run before any DNS change.
 * The coordinator logs the message; nothing else observes it.
 */
export class RunAbortedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RunAbortedError";
  }
}
