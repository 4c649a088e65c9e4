import type { Command } from "commander";
import type { CliContext } from "./context.ts";
import { resolveRecipient } from "../share/recipient.ts";
import { readSelection, readStdin } from "../share/selection.ts";

type ShareOptions = {
  to: string;
  file?: string;
  lines?: string;
  cache?: boolean;
};

export function registerShareCommand(input: { program: Command; ctx: CliContext }): void {
  input.program
    .command("share")
    .description("Share a snippet with a workspace member or channel")
    .argument("[text]", "Text to share (default: --file, or stdin)")
    .requiredOption("--to <recipient>", "Member name, member id (U...) or channel id (C...)")
    .option("--file <path>", "Share the contents of a file")
    .option("--lines <range>", "Only share these lines of --file, e.g. 10-24")
    .option("--no-cache", "Refresh the member directory before resolving --to")
    .action(async (...args) => {
      const [text, options] = args as [string | undefined, ShareOptions];
      try {
        const client = input.ctx.getDirectoryClient();
        const content = await readSelection({
          text,
          file: options.file,
          lines: options.lines,
          stdin: readStdin,
        });
        const directory = await client.getDirectory(input.ctx.shouldRefresh(options));
        const recipient = resolveRecipient(directory, options.to);
        await client.postMessage(content, recipient.id);
        console.log(
          JSON.stringify(
            {
              status: "sent",
              channel: recipient.id,
              name: recipient.kind === "entry" ? recipient.entry.name : undefined,
            },
            null,
            2,
          ),
        );
      } catch (err: unknown) {
        console.error(input.ctx.errorMessage(err));
        process.exitCode = 1;
      }
    });
}
