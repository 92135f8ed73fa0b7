import { errors, request } from "undici";

export interface HttpGetOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
}

export interface HttpResponse {
  statusCode: number;
  text: string;
}

/**
 * The request never produced a response: connection failure, DNS,
 * or the deadline passed.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly timedOut: boolean,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "TransportError";
  }
}

/**
 * The abort reason of `AbortSignal.timeout` is a DOMException, which may
 * come from another realm, so it is matched by shape rather than class.
 */
function hasName(error: unknown, name: string): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    error.name === name
  );
}

function messageOf(error: unknown): string {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof errors.HeadersTimeoutError ||
    error instanceof errors.BodyTimeoutError ||
    error instanceof errors.ConnectTimeoutError ||
    hasName(error, "TimeoutError")
  );
}

/**
 * GET a URL and read the whole body as text. Non-2xx answers are returned,
 * not thrown; callers decide what a status means. No retries.
 */
export async function httpGet(
  url: string,
  options: HttpGetOptions,
): Promise<HttpResponse> {
  try {
    const { statusCode, body } = await request(url, {
      method: "GET",
      headers: options.headers,
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    const text = await body.text();
    return { statusCode, text };
  } catch (error) {
    const timedOut = isTimeout(error);
    const message = messageOf(error);
    throw new TransportError(message, timedOut, error);
  }
}

/** Parse a JSON body, returning undefined for malformed input. */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
