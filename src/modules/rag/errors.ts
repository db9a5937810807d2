export class RetrieverHealthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RetrieverHealthError";
  }
}
