import { z } from "zod";
import type { SlackApi } from "./client.ts";
import type { Directory, DirectoryEntry } from "../directory/schema.ts";
import { SlackProtocolError } from "../lib/errors.ts";

const MemberSchema = z.object({
  id: z.string().min(1),
  team_id: z.string(),
  deleted: z.boolean(),
  profile: z.object({
    real_name: z.string(),
  }),
});

const UsersListResponseSchema = z.object({
  ok: z.literal(true),
  members: z.array(MemberSchema),
});

export type SlackMember = z.infer<typeof MemberSchema>;

/**
 * Fetches the workspace member list and maps it into a Directory.
 * Deleted members are dropped here and never reach the cache.
 */
export async function fetchUserDirectory(client: SlackApi): Promise<Directory> {
  const resp = await client.api("users.list");
  const parsed = UsersListResponseSchema.safeParse(resp);
  if (!parsed.success) {
    throw new SlackProtocolError("users.list", describeIssue(parsed.error));
  }
  return toDirectory(parsed.data.members);
}

export function toDirectory(members: SlackMember[]): Directory {
  return members.filter((m) => !m.deleted).map(toDirectoryEntry);
}

function toDirectoryEntry(member: SlackMember): DirectoryEntry {
  return {
    id: member.id,
    team: member.team_id,
    name: member.profile.real_name,
  };
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "invalid body";
  }
  const path = issue.path.length > 0 ? issue.path.join(".") : "body";
  return `${path}: ${issue.message}`;
}
