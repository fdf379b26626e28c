export abstract class UpstreamError extends Error {
  abstract readonly kind: "timeout" | "unavailable" | "parse";
}

export class UpstreamTimeoutError extends UpstreamError {
  readonly kind = "timeout";
  constructor(readonly timeoutMs: number) {
    super(`Trial registry did not respond within ${timeoutMs}ms`);
    this.name = "UpstreamTimeoutError";
  }
}

export class UpstreamUnavailableError extends UpstreamError {
  readonly kind = "unavailable";
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "UpstreamUnavailableError";
  }
}

export class UpstreamParseError extends UpstreamError {
  readonly kind = "parse";
  constructor(message: string) {
    super(message);
    this.name = "UpstreamParseError";
  }
}
