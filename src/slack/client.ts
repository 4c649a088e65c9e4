import { addAppMetadata, ErrorCode, LogLevel, WebClient } from "@slack/web-api";
import { APP_NAME } from "../lib/app-dir.ts";
import {
  SlackApiError,
  SlackHttpError,
  SlackTransportError,
} from "../lib/errors.ts";
import { getNumber, getString, isRecord } from "../lib/object-type-guards.ts";
import { getPackageVersion } from "../lib/version.ts";

addAppMetadata({ name: APP_NAME, version: getPackageVersion() });

/** The one method the rest of the code needs; tests stub it directly. */
export type SlackApi = Pick<SlackApiClient, "api">;

export type SlackApiClientOptions = {
  apiUrl?: string;
  debug?: boolean;
};

/**
 * Thin wrapper over the Slack SDK's `WebClient` that turns every failure into
 * one of the typed errors in `lib/errors.ts`. Calls are never retried.
 */
export class SlackApiClient {
  private web: WebClient;

  constructor(token: string, options?: SlackApiClientOptions) {
    this.web = new WebClient(token, {
      slackApiUrl: options?.apiUrl,
      logLevel: options?.debug ? LogLevel.DEBUG : LogLevel.ERROR,
      retryConfig: { retries: 0 },
      rejectRateLimitedCalls: true,
    });
  }

  async api(
    method: string,
    params: Record<string, unknown> = {},
  ): Promise<Record<string, unknown>> {
    let result: unknown;
    try {
      result = await this.web.apiCall(method, params);
    } catch (err: unknown) {
      throw toSlackError(method, err);
    }

    if (!isRecord(result) || result.ok !== true) {
      const error = isRecord(result) ? getString(result.error) : undefined;
      throw new SlackApiError(method, error);
    }
    return result;
  }
}

export function toSlackError(method: string, err: unknown): Error {
  if (!isRecord(err)) {
    return new SlackTransportError(method, err);
  }

  switch (err.code) {
    case ErrorCode.PlatformError: {
      const data = isRecord(err.data) ? err.data : {};
      return new SlackApiError(method, getString(data.error));
    }
    case ErrorCode.HTTPError:
      return new SlackHttpError(method, getNumber(err.statusCode) ?? 0);
    case ErrorCode.RateLimitedError:
      return new SlackHttpError(method, 429);
    default:
      return new SlackTransportError(method, err);
  }
}
