export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export class DocModelError extends Error {
  readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.context = context;
  }
}

/** Caller broke a precondition (e.g. handed the extractor no tree). */
export class InvalidArgumentError extends DocModelError {}

export class RepositoryClosedError extends DocModelError {
  constructor(root: string) {
    super(`Repository handle for ${root} has been closed`, { root });
  }
}

export class GrammarUnavailableError extends DocModelError {}

export class BinaryContentError extends DocModelError {
  constructor(path: string) {
    super(`Binary content in ${path}`, { path });
  }
}

export class ConfigError extends DocModelError {}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
