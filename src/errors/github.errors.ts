export class AuthError extends Error {
  constructor(message = "GitHub rejected the token (401). Check that it is valid and not expired.") {
    super(message);
    this.name = "AuthError";
  }
}

export class NotFoundError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`GitHub resource not found (404): ${url}`);
    this.name = "NotFoundError";
    this.url = url;
  }
}

export class ForbiddenError extends Error {
  readonly url: string;

  constructor(url: string, detail?: string | null) {
    const suffix = detail ? `: ${detail}` : "";
    super(`GitHub denied access (403) to ${url}${suffix}`);
    this.name = "ForbiddenError";
    this.url = url;
  }
}

export class RateLimitExceededError extends Error {
  readonly waitMs: number | null;

  constructor(params: { waitMs?: number | null; maxWaitMs?: number; attempts?: number }) {
    const waitMs = params.waitMs ?? null;
    const message =
      waitMs !== null && params.maxWaitMs !== undefined
        ? `GitHub rate limit exhausted; reset is ${Math.ceil(waitMs / 1000)}s away, beyond the ${Math.ceil(
            params.maxWaitMs / 1000
          )}s wait ceiling.`
        : `GitHub kept rejecting requests as rate limited after ${params.attempts ?? 0} retries.`;
    super(message);
    this.name = "RateLimitExceededError";
    this.waitMs = waitMs;
  }
}

export class TransientNetworkError extends Error {
  readonly attempts: number;

  constructor(url: string, attempts: number, message: string) {
    super(`GitHub request to ${url} failed after ${attempts} attempts: ${message}`);
    this.name = "TransientNetworkError";
    this.attempts = attempts;
  }
}

export class GitHubApiResponseError extends Error {
  readonly status: number;

  constructor(url: string, status: number, detail?: string | null) {
    const suffix = detail ? `: ${detail}` : "";
    super(`GitHub request to ${url} failed with status ${status}${suffix}`);
    this.name = "GitHubApiResponseError";
    this.status = status;
  }
}

export class RequestCancelledError extends Error {
  constructor() {
    super("Request cancelled.");
    this.name = "RequestCancelledError";
  }
}

export class UnexpectedPayloadError extends Error {
  constructor(context: string, detail: string) {
    super(`Unexpected GitHub response for ${context}: ${detail}`);
    this.name = "UnexpectedPayloadError";
  }
}
