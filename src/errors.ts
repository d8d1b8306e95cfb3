/**
 * Raised by a language-model adapter when the remote service rejects or
 * fails a request (auth, quota, network, server side).
 */
export class ModelServiceError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModelServiceError";
    this.status = status;
  }
}

export class ConfigError extends Error {
  readonly keys: string[];

  constructor(message: string, keys: string[]) {
    super(message);
    this.name = "ConfigError";
    this.keys = keys;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
