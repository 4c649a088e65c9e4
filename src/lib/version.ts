import { readFileSync } from "node:fs";
import { z } from "zod";

const PackageJsonSchema = z.object({ version: z.string().min(1) });

let cachedVersion: string | undefined;

/** Version from the package.json two levels above src/lib. */
export function getPackageVersion(): string {
  if (cachedVersion === undefined) {
    cachedVersion = readVersion();
  }
  return cachedVersion;
}

function readVersion(): string {
  let raw: string;
  try {
    raw = readFileSync(new URL("../../package.json", import.meta.url), "utf8");
  } catch {
    return "0.0.0";
  }
  const parsed = PackageJsonSchema.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data.version : "0.0.0";
}
