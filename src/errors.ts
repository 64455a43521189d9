/**
 * Custom error classes for repo-automation
 * Provides structured error handling with context for CLI reporting
 */

/**
 * Base error class for all repo-automation errors
 */
export class RepoAutomationError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RepoAutomationError";
  }
}

/**
 * Error in an environment or CLI-provided setting
 */
export class ConfigurationError extends RepoAutomationError {
  constructor(
    message: string,
    public readonly setting?: string,
    context?: Record<string, unknown>,
  ) {
    super(message, "CONFIGURATION_ERROR", { setting, ...context });
    this.name = "ConfigurationError";
  }
}

/**
 * A required setting was not provided
 */
export class MissingConfigurationError extends RepoAutomationError {
  constructor(public readonly setting: string) {
    super(
      `Missing configuration: ${setting} must be set`,
      "MISSING_CONFIGURATION",
      { setting },
    );
    this.name = "MissingConfigurationError";
  }
}

/**
 * The documentation configuration file does not exist
 */
export class ConfigNotFoundError extends RepoAutomationError {
  constructor(public readonly configPath: string) {
    super(`Configuration file ${configPath} not found`, "CONFIG_NOT_FOUND", {
      configPath,
    });
    this.name = "ConfigNotFoundError";
  }
}

/**
 * The documentation configuration file is not a valid YAML mapping
 */
export class ConfigParseError extends RepoAutomationError {
  constructor(
    message: string,
    public readonly configPath: string,
    cause?: unknown,
  ) {
    super(`Error parsing ${configPath}: ${message}`, "CONFIG_PARSE_ERROR", {
      configPath,
    }, { cause });
    this.name = "ConfigParseError";
  }
}

/**
 * Writing a generated file failed
 */
export class WriteError extends RepoAutomationError {
  constructor(
    public readonly outputPath: string,
    cause: unknown,
  ) {
    super(
      `Error writing ${outputPath}: ${errorMessage(cause)}`,
      "WRITE_ERROR",
      { outputPath },
      { cause },
    );
    this.name = "WriteError";
  }
}

/**
 * The lint findings file could not be read
 */
export class FindingsReadError extends RepoAutomationError {
  constructor(
    public readonly findingsPath: string,
    cause: unknown,
  ) {
    super(
      `Error reading lint output ${findingsPath}: ${errorMessage(cause)}`,
      "FINDINGS_READ_ERROR",
      { findingsPath },
      { cause },
    );
    this.name = "FindingsReadError";
  }
}

/**
 * Error from a remote API (language model or source hosting)
 */
export class ExternalServiceError extends RepoAutomationError {
  constructor(
    message: string,
    code: string,
    public readonly service: string,
    public readonly status?: number,
    context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message, code, { service, status, ...context }, { cause });
    this.name = "ExternalServiceError";
  }
}

/**
 * The completion service failed or returned nothing usable
 */
export class CompletionServiceError extends ExternalServiceError {
  constructor(
    message: string,
    provider: string,
    status?: number,
    cause?: unknown,
  ) {
    super(message, "COMPLETION_SERVICE_ERROR", provider, status, {}, cause);
    this.name = "CompletionServiceError";
  }
}

/**
 * A GitHub call made while publishing a comment failed
 */
export class CommentServiceError extends ExternalServiceError {
  constructor(
    message: string,
    public readonly step: "repository" | "pull-request" | "comment",
    status?: number,
    cause?: unknown,
  ) {
    super(message, "COMMENT_SERVICE_ERROR", "github", status, { step }, cause);
    this.name = "CommentServiceError";
  }
}

export function isRepoAutomationError(
  error: unknown,
): error is RepoAutomationError {
  return error instanceof RepoAutomationError;
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read the HTTP status SDK errors carry (openai APIError, octokit RequestError)
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}
