// Error classification for OpenAI-compatible providers.
//
// Split into two categories:
//   Transport errors: connectivity problems (server not running, DNS, timeout)
//   Provider errors:  the server responded but rejected the request (auth, rate limit, etc.)

import type { ProviderErrorCode } from "@toolstream/core";

/**
 * Map a caught error to a normalized ProviderErrorCode.
 * Handles both HTTP response errors (message contains status code) and
 * network-level errors (ECONNREFUSED, etc.).
 */
export function classifyError(err: unknown): ProviderErrorCode {
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    const name = err.name.toLowerCase();
    const causeCode =
      err.cause instanceof Error && "code" in err.cause && typeof err.cause.code === "string"
        ? err.cause.code.toLowerCase()
        : "";

    // Cancellation (checked before network; AbortError is not a transport failure)
    if (name === "aborterror" || msg.includes("aborted") || msg.includes("cancelled")) {
      return "cancelled";
    }

    // Transport errors (undici reports the socket error as the cause of "fetch failed")
    if (
      causeCode.startsWith("econn") ||
      msg.includes("econnrefused") ||
      msg.includes("econnreset") ||
      msg.includes("enotfound") ||
      msg.includes("etimedout") ||
      msg.includes("network") ||
      msg.includes("fetch failed")
    ) {
      return "transient_network";
    }

    // Provider errors: auth
    if (
      msg.includes("api key") ||
      msg.includes("unauthorized") ||
      msg.includes("forbidden") ||
      msg.includes("status 401") ||
      msg.includes("status 403")
    ) {
      return "auth_failed";
    }

    // Provider errors: rate limiting
    if (msg.includes("rate limit") || msg.includes("status 429") || msg.includes("quota")) {
      return "throttled";
    }

    // Provider errors: context length
    if (msg.includes("context length") || msg.includes("context_length_exceeded") || msg.includes("too long")) {
      return "context_length_exceeded";
    }

    // Provider errors: bad request
    if (msg.includes("invalid") || msg.includes("status 400") || msg.includes("bad request")) {
      return "invalid_request";
    }

    // Server-side failures are worth retrying
    if (/status 5\d\d/.test(msg) || msg.includes("overloaded")) {
      return "transient_network";
    }
  }
  return "unknown";
}

/**
 * Build a human-readable error hint, mainly for local servers (where the
 * user needs to know if their server is actually running).
 */
export function buildErrorHint(
  code: ProviderErrorCode,
  providerName: string,
  baseUrl: string,
): string {
  if (code === "transient_network") {
    return ` — is ${providerName} reachable at ${baseUrl}?`;
  }
  if (code === "auth_failed") {
    return " — check OPENAI_API_KEY";
  }
  return "";
}
