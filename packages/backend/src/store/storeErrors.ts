export class StoreUnavailableError extends Error {
  constructor(message = "Graph store is not connected", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}
