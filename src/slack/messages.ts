import type { ContextBlock, SectionBlock } from "@slack/web-api";
import type { SlackApi } from "./client.ts";
import { APP_NAME } from "../lib/app-dir.ts";
import { MessageDeliveryError } from "../lib/errors.ts";

export const SHARE_ATTRIBUTION = `Shared with *${APP_NAME}*`;

export type ShareBlocks = [SectionBlock, ContextBlock];

/** Snippet in a code fence, followed by the attribution footer. */
export function buildShareBlocks(content: string): ShareBlocks {
  return [
    {
      type: "section",
      text: { type: "mrkdwn", text: "```\n" + content + "```" },
    },
    {
      type: "context",
      elements: [{ type: "mrkdwn", text: SHARE_ATTRIBUTION }],
    },
  ];
}

export async function postSnippet(
  client: SlackApi,
  input: { content: string; channel: string },
): Promise<{ channel: string; ts?: string }> {
  try {
    const resp = await client.api("chat.postMessage", {
      channel: input.channel,
      blocks: buildShareBlocks(input.content),
      text: input.content,
    });
    const channel = typeof resp.channel === "string" ? resp.channel : input.channel;
    const ts = typeof resp.ts === "string" ? resp.ts : undefined;
    return { channel, ts };
  } catch (err: unknown) {
    throw new MessageDeliveryError(input.channel, err);
  }
}
