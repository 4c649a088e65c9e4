import { spawn } from "node:child_process";
import type { DirectoryEntry } from "../directory/schema.ts";

/** `slack://` URL that opens a DM with the member in the desktop app. */
export function buildUserDeepLink(entry: Pick<DirectoryEntry, "id" | "team">): string {
  const params = new URLSearchParams({ team: entry.team, id: entry.id });
  return `slack://user?${params.toString()}`;
}

export function openerCommand(
  url: string,
  platform: NodeJS.Platform = process.platform,
): { command: string; args: string[] } {
  if (platform === "darwin") {
    return { command: "open", args: [url] };
  }
  if (platform === "win32") {
    return { command: "cmd", args: ["/c", "start", "", url] };
  }
  return { command: "xdg-open", args: [url] };
}

export function openDeepLink(url: string): Promise<void> {
  const { command, args } = openerCommand(url);
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: "ignore", detached: true });
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });
}
