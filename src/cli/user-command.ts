import type { Command } from "commander";
import type { CliContext } from "./context.ts";
import { toNameMap } from "../directory/schema.ts";
import { RecipientError } from "../lib/errors.ts";
import { resolveRecipient } from "../share/recipient.ts";
import { buildUserDeepLink, openDeepLink } from "../slack/deep-link.ts";

export function registerUserCommand(input: { program: Command; ctx: CliContext }): void {
  const userCmd = input.program.command("user").description("Workspace member directory");

  userCmd
    .command("list")
    .description("List workspace members (from the cache when present)")
    .option("--refresh", "Fetch from Slack and overwrite the cache")
    .option("--no-cache", "Same as --refresh")
    .option("--by-name", "Print an object keyed by display name")
    .action(async (...args) => {
      const [options] = args as [{ refresh?: boolean; cache?: boolean; byName?: boolean }];
      try {
        const client = input.ctx.getDirectoryClient();
        const directory = await client.getDirectory(input.ctx.shouldRefresh(options));
        const payload = options.byName ? Object.fromEntries(toNameMap(directory)) : directory;
        console.log(JSON.stringify(payload, null, 2));
      } catch (err: unknown) {
        console.error(input.ctx.errorMessage(err));
        process.exitCode = 1;
      }
    });

  userCmd
    .command("link")
    .description("Print the slack:// link that opens a DM with a member")
    .argument("<member>", "Member name or id (U...)")
    .option("--open", "Open the link in the Slack app")
    .option("--no-cache", "Refresh the member directory before resolving <member>")
    .action(async (...args) => {
      const [member, options] = args as [string, { open?: boolean; cache?: boolean }];
      try {
        const client = input.ctx.getDirectoryClient();
        const directory = await client.getDirectory(input.ctx.shouldRefresh(options));
        const match = resolveRecipient(directory, member);
        if (match.kind !== "entry") {
          throw new RecipientError(`${member} is not a cached member; run "slack-share cache update"`);
        }
        const url = buildUserDeepLink(match.entry);
        if (options.open) {
          await openDeepLink(url);
        }
        console.log(JSON.stringify({ id: match.entry.id, name: match.entry.name, url }, null, 2));
      } catch (err: unknown) {
        console.error(input.ctx.errorMessage(err));
        process.exitCode = 1;
      }
    });
}
