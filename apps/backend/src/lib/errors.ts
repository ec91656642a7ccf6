// apps/backend/src/lib/errors.ts
// Errors carry the HTTP status the API error handler should answer with.

export class FillError extends Error {
  readonly status: number

  constructor(message: string, status = 500) {
    super(message)
    this.name = new.target.name
    this.status = status
  }
}

/** The uploaded bytes are not a usable .docx document. */
export class DocumentError extends FillError {
  constructor(message: string) {
    super(message, 400)
  }
}

/** Scanning found nothing to fill; the session cannot start. */
export class NoPlaceholdersError extends FillError {
  constructor() {
    super('No placeholders found. Ensure placeholders are in [brackets].', 422)
  }
}

export class SessionNotFoundError extends FillError {
  constructor(id: string) {
    super(`Session ${id} not found`, 404)
  }
}

/** The generation service failed during a conversational turn. */
export class GenerationError extends FillError {
  constructor(message: string, readonly upstream?: unknown) {
    super(message, 502)
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
