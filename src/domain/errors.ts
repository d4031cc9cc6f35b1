export type AgentErrorCode =
  | "INDEX_UNAVAILABLE"
  | "CREDENTIALS_MISSING"
  | "PROVIDER_ERROR"
  | "CLASSIFIER_ERROR"
  | "GENERATION_ERROR"
  | "MALFORMED_OUTPUT"
  | "STAGE_UNAVAILABLE"
  | "INVALID_INPUT"
  | "TIMEOUT"
  | "CANCELLED";

/**
 * Base class for every failure the answering pipeline distinguishes.
 * Fatal errors mean a capability is structurally unavailable (missing index or
 * credential); the rest are per-call and recoverable.
 */
export abstract class AgentError extends Error {
  abstract readonly code: AgentErrorCode;

  readonly fatal: boolean = false;
}

/**
 * Thrown when the local index has not been built or loaded yet.
 */
export class IndexUnavailableError extends AgentError {
  readonly code = "INDEX_UNAVAILABLE";

  override readonly fatal = true;

  constructor(reason = "local index is not loaded", options?: ErrorOptions) {
    super(`Local retrieval is unavailable: ${reason}.`, options);
    this.name = "IndexUnavailableError";
  }
}

/**
 * Thrown when a backend needs a credential that is not configured.
 */
export class CredentialsMissingError extends AgentError {
  readonly code = "CREDENTIALS_MISSING";

  override readonly fatal = true;

  constructor(
    public readonly serviceName: string,
    public readonly missingConfig: string[],
  ) {
    super(`${serviceName} is not configured. Missing: ${missingConfig.join(", ")}`);
    this.name = "CredentialsMissingError";
  }
}

export class ProviderError extends AgentError {
  readonly code = "PROVIDER_ERROR";

  constructor(
    public readonly providerName: string,
    public readonly statusCode: number | undefined,
    message: string,
    options?: ErrorOptions,
  ) {
    super(
      `${providerName} request failed${statusCode ? ` (HTTP ${statusCode})` : ""}: ${message}`,
      options,
    );
    this.name = "ProviderError";
  }
}

export class ClassifierError extends AgentError {
  readonly code = "CLASSIFIER_ERROR";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ClassifierError";
  }
}

export class GenerationError extends AgentError {
  readonly code = "GENERATION_ERROR";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GenerationError";
  }
}

export class MalformedOutputError extends AgentError {
  readonly code = "MALFORMED_OUTPUT";

  constructor(
    message: string,
    public readonly rawOutput: string,
  ) {
    super(message);
    this.name = "MalformedOutputError";
  }
}

/**
 * A pipeline stage that left the request with no usable input. Its message is
 * shown to the caller in the fallback answer.
 */
export class StageUnavailableError extends AgentError {
  readonly code = "STAGE_UNAVAILABLE";

  constructor(
    public readonly stage: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`${stage} is unavailable (${detail})`, options);
    this.name = "StageUnavailableError";
  }
}

export class InvalidInputError extends AgentError {
  readonly code = "INVALID_INPUT";

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class CallTimeoutError extends AgentError {
  readonly code = "TIMEOUT";

  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "CallTimeoutError";
  }
}

export class RequestCancelledError extends AgentError {
  readonly code = "CANCELLED";

  constructor(operation = "Request") {
    super(`${operation} was cancelled`);
    this.name = "RequestCancelledError";
  }
}

export function isFatalError(error: unknown): boolean {
  return error instanceof AgentError && error.fatal;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
