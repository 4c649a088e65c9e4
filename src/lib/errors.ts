export type SlackShareErrorCode =
  | "configuration"
  | "transport"
  | "http"
  | "api"
  | "protocol"
  | "delivery"
  | "cache_write"
  | "recipient"
  | "selection";

export class SlackShareError extends Error {
  readonly code: SlackShareErrorCode;

  constructor(code: SlackShareErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing or invalid settings. Raised once, before any command work starts. */
export class ConfigurationError extends SlackShareError {
  constructor(message: string) {
    super("configuration", message);
  }
}

/** The request never produced an HTTP response. */
export class SlackTransportError extends SlackShareError {
  readonly method: string;

  constructor(method: string, cause: unknown) {
    super("transport", `Could not reach Slack calling ${method}: ${errorMessage(cause)}`, {
      cause,
    });
    this.method = method;
  }
}

export class SlackHttpError extends SlackShareError {
  readonly method: string;
  readonly status: number;

  constructor(method: string, status: number) {
    super("http", `Slack HTTP ${status} calling ${method}`);
    this.method = method;
    this.status = status;
  }
}

/** Slack answered with `ok: false`. `slackError` is the remote error string. */
export class SlackApiError extends SlackShareError {
  readonly method: string;
  readonly slackError: string;

  constructor(method: string, slackError: string | undefined) {
    const detail = slackError?.trim() || "Unknown error";
    super("api", `Slack API Error: ${detail}`);
    this.method = method;
    this.slackError = detail;
  }
}

export class SlackProtocolError extends SlackShareError {
  readonly method: string;

  constructor(method: string, detail: string) {
    super("protocol", `Unexpected response from ${method}: ${detail}`);
    this.method = method;
  }
}

export class MessageDeliveryError extends SlackShareError {
  readonly channel: string;

  constructor(channel: string, cause: unknown) {
    super("delivery", `Could not send the message to ${channel}: ${errorMessage(cause)}`, {
      cause,
    });
    this.channel = channel;
  }
}

export class CacheWriteError extends SlackShareError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("cache_write", `Unable to write cache file ${path}: ${errorMessage(cause)}`, {
      cause,
    });
    this.path = path;
  }
}

export class RecipientError extends SlackShareError {
  readonly candidates: string[];

  constructor(message: string, candidates: string[] = []) {
    super("recipient", message);
    this.candidates = candidates;
  }
}

export class SelectionError extends SlackShareError {
  constructor(message: string) {
    super("selection", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
