import { homedir, tmpdir } from "node:os";
import { join } from "node:path";

export const APP_NAME = "slack-share";

export function getAppDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env.XDG_CACHE_HOME?.trim();
  if (xdg) {
    return join(xdg, APP_NAME);
  }

  const home = homedir();
  if (home) {
    return join(home, ".cache", APP_NAME);
  }

  return join(tmpdir(), APP_NAME);
}

export function getDefaultCachePath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getAppDir(env), "users-cache.json");
}
