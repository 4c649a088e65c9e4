import { describe, expect, test } from "vitest";
import { buildShareBlocks, SHARE_ATTRIBUTION } from "../src/slack/messages.ts";

describe("buildShareBlocks", () => {
  test("fences the content and adds the attribution footer", () => {
    expect(buildShareBlocks("const x = 1;\n")).toEqual([
      { type: "section", text: { type: "mrkdwn", text: "```\nconst x = 1;\n```" } },
      { type: "context", elements: [{ type: "mrkdwn", text: "Shared with *slack-share*" }] },
    ]);
  });

  test("attribution names the tool", () => {
    expect(SHARE_ATTRIBUTION).toBe("Shared with *slack-share*");
  });
});
