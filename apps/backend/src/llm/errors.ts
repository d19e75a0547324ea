// Errors raised while talking to the model provider.

export class ProviderError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "ProviderError";
    this.status = status;
  }
}

// The whole (non-streamed) response carried no text.
export class ResponseBlockedError extends Error {
  readonly reason: string | undefined;

  constructor(reason?: string) {
    super(reason ? `response_blocked: ${reason}` : "response_blocked");
    this.name = "ResponseBlockedError";
    this.reason = reason;
  }
}

export class ResponseShapeError extends Error {
  constructor(expectedStreaming: boolean) {
    super(expectedStreaming ? "expected_streamed_response" : "expected_single_response");
    this.name = "ResponseShapeError";
  }
}
