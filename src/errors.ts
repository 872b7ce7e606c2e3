/**
 * Error classes shared by the API clients and the mirror store
 */

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly service: "github" | "gitlab",
    public readonly status?: number,
    public readonly response?: string
  ) {
    super(message);
    this.name = "ApiError";
    Object.setPrototypeOf(this, ApiError.prototype);
  }
}

export class GitCommandError extends Error {
  constructor(
    public readonly command: string,
    cause: unknown
  ) {
    super(`git ${command} failed: ${errorMessage(cause)}`, { cause });
    this.name = "GitCommandError";
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
