/** Base for failures the HTTP layer turns into a client-facing response. */
export class AppError extends Error {
  constructor(readonly code: string, message: string) {
    super(message);
    this.name = new.target.name;
  }

  details(): Record<string, unknown> {
    return {};
  }
}
