import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { loadConfig } from "../src/lib/config.ts";
import { ConfigurationError } from "../src/lib/errors.ts";

describe("loadConfig", () => {
  test("requires SLACK_TOKEN", () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    expect(() => loadConfig({})).toThrow(
      "Error: SLACK_TOKEN is missing. Please set it as an environment variable.",
    );
  });

  test("treats a blank token as missing", () => {
    expect(() => loadConfig({ SLACK_TOKEN: "   " })).toThrow(
      "Error: SLACK_TOKEN is missing. Please set it as an environment variable.",
    );
  });

  test("defaults the cache path under XDG_CACHE_HOME", () => {
    const config = loadConfig({ SLACK_TOKEN: "xoxb-test", XDG_CACHE_HOME: "/tmp/xdg" });
    expect(config).toEqual({
      token: "xoxb-test",
      cachePath: join("/tmp/xdg", "slack-share", "users-cache.json"),
      apiUrl: undefined,
      noCache: false,
      debug: false,
    });
  });

  test("reads overrides", () => {
    const config = loadConfig({
      SLACK_TOKEN: " xoxb-test ",
      SLACK_SHARE_CACHE_FILE: "/tmp/users.json",
      SLACK_API_URL: "http://localhost:3000/api/",
      SLACK_SHARE_NO_CACHE: "1",
      SLACK_SHARE_DEBUG: "true",
    });
    expect(config).toEqual({
      token: "xoxb-test",
      cachePath: "/tmp/users.json",
      apiUrl: "http://localhost:3000/api/",
      noCache: true,
      debug: true,
    });
  });

  test("rejects an invalid API URL", () => {
    expect(() => loadConfig({ SLACK_TOKEN: "xoxb-test", SLACK_API_URL: "not a url" })).toThrow(
      new ConfigurationError("Error: SLACK_API_URL must be a URL."),
    );
  });
});
