import { AppError, SerializedError } from "./AppError";

/**
 * Errors raised while parsing, fetching or rendering scripture.
 *
 * Each carries the HTTP status it should surface as, so the same error can
 * be reported by the lookup endpoint and collected by the batch resolver.
 */
export abstract class ScriptureError extends AppError {
  constructor(
    message: string,
    code: string,
    public readonly statusCode: number,
  ) {
    super(message, code);
  }
}

// Directive authoring errors

export class ReferenceParseError extends ScriptureError {
  constructor(public readonly text: string) {
    super(`Could not parse scripture reference '${text}'.`, "REFERENCE_PARSE_ERROR", 400);
    this.name = "ReferenceParseError";
  }
}

export class UnknownBookError extends ScriptureError {
  constructor(public readonly book: string) {
    super(`Unknown book '${book}'.`, "UNKNOWN_BOOK", 400);
    this.name = "UnknownBookError";
  }
}

export class MissingReferenceError extends ScriptureError {
  constructor(public readonly spec: string) {
    super("Scripture placeholder is missing a reference.", "MISSING_REFERENCE", 400);
    this.name = "MissingReferenceError";
  }
}

export class UnsupportedVersionError extends ScriptureError {
  constructor(public readonly version: string) {
    super(`Unsupported scripture version '${version}'.`, "UNSUPPORTED_VERSION", 400);
    this.name = "UnsupportedVersionError";
  }
}

export class InvalidOptionSyntaxError extends ScriptureError {
  constructor(public readonly option: string) {
    super(
      `Invalid option '${option}' in scripture placeholder. Use key=value.`,
      "INVALID_OPTION_SYNTAX",
      400,
    );
    this.name = "InvalidOptionSyntaxError";
  }
}

export class UnknownOptionError extends ScriptureError {
  constructor(public readonly key: string) {
    super(`Unknown option '${key}' in scripture placeholder.`, "UNKNOWN_OPTION", 400);
    this.name = "UnknownOptionError";
  }
}

export class InvalidBooleanError extends ScriptureError {
  constructor(
    public readonly key: string,
    public readonly value: string,
  ) {
    super(
      `Invalid boolean value '${value}' for option '${key}' in scripture placeholder.`,
      "INVALID_BOOLEAN",
      400,
    );
    this.name = "InvalidBooleanError";
  }
}

// Provider errors

export abstract class ProviderError extends ScriptureError {
  constructor(
    message: string,
    code: string,
    statusCode: number,
    public readonly provider: string,
  ) {
    super(message, code, statusCode);
  }
}

/** Missing credential: the service is unavailable, the request is fine. */
export class ProviderConfigError extends ProviderError {
  constructor(provider: string, message: string) {
    super(message, "PROVIDER_NOT_CONFIGURED", 503, provider);
    this.name = "ProviderConfigError";
  }
}

/**
 * Non-2xx answer from the provider. The upstream status is kept for logs
 * and is not part of the serialized error.
 */
export class ProviderUpstreamError extends ProviderError {
  constructor(
    provider: string,
    message: string,
    public readonly upstreamStatus: number | null,
  ) {
    super(message, "PROVIDER_UPSTREAM_ERROR", 502, provider);
    this.name = "ProviderUpstreamError";
  }
}

export class ProviderRateLimitError extends ProviderError {
  constructor(provider: string) {
    super(
      `${provider} rate limit exceeded. Try again later.`,
      "PROVIDER_RATE_LIMITED",
      429,
      provider,
    );
    this.name = "ProviderRateLimitError";
  }
}

export class ProviderNotFoundError extends ProviderError {
  constructor(provider: string) {
    super(
      "No passage text returned for the given reference.",
      "PASSAGE_NOT_FOUND",
      404,
      provider,
    );
    this.name = "ProviderNotFoundError";
  }
}

export class ProviderNetworkError extends ProviderError {
  constructor(
    provider: string,
    public readonly timedOut: boolean,
    timeoutMs?: number,
  ) {
    super(
      timedOut
        ? `${provider} did not respond within ${timeoutMs ?? 0}ms.`
        : `Could not reach ${provider}. Try again later.`,
      "PROVIDER_UNREACHABLE",
      502,
      provider,
    );
    this.name = "ProviderNetworkError";
  }
}

// Batch

export interface DirectiveFailure {
  directive: string;
  reference: string;
  version: string;
  code: string;
  message: string;
}

/**
 * One or more directives of a resolution pass failed. Nothing was written.
 */
export class BatchResolutionError extends ScriptureError {
  constructor(public readonly failures: DirectiveFailure[]) {
    super(
      "Failed to fetch scripture for: " +
        failures
          .map((f) => `${f.reference} (${f.version}): ${f.message}`)
          .join("; "),
      "BATCH_RESOLUTION_FAILED",
      422,
    );
    this.name = "BatchResolutionError";
  }

  toJSON(): SerializedError {
    return {
      ...super.toJSON(),
      failures: this.failures,
    };
  }
}
