/** Base class for SDK-level errors. Provides a stable `code`. */
export abstract class BotwireError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}
