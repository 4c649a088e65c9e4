import type { Directory, DirectoryEntry } from "../directory/schema.ts";
import { RecipientError } from "../lib/errors.ts";

export type RecipientMatch =
  | { kind: "id"; id: string }
  | { kind: "entry"; id: string; entry: DirectoryEntry };

export function isConversationId(input: string): boolean {
  return /^[CDGUW][A-Z0-9]{8,}$/.test(input);
}

/**
 * Resolves `--to` against the directory: cached ids, then exact name,
 * case-insensitive name, uncached ids as-is, and finally a unique
 * case-insensitive substring.
 */
export function resolveRecipient(directory: Directory, selector: string): RecipientMatch {
  const raw = selector.trim().replace(/^@/, "");
  if (!raw) {
    throw new RecipientError("Recipient is empty");
  }

  const byId = directory.find((e) => e.id === raw);
  if (byId) {
    return { kind: "entry", id: byId.id, entry: byId };
  }
  const exact = lastMatch(directory, (e) => e.name === raw);
  if (exact) {
    return { kind: "entry", id: exact.id, entry: exact };
  }

  const needle = raw.toLowerCase();
  const caseless = lastMatch(directory, (e) => e.name.toLowerCase() === needle);
  if (caseless) {
    return { kind: "entry", id: caseless.id, entry: caseless };
  }

  // Only after names: a member may be called something like "WILLIAMSON".
  if (isConversationId(raw)) {
    return { kind: "id", id: raw };
  }

  const partial = directory.filter((e) => e.name.toLowerCase().includes(needle));
  if (partial.length === 1) {
    const [only] = partial;
    if (only) {
      return { kind: "entry", id: only.id, entry: only };
    }
  }
  if (partial.length > 1) {
    const candidates = partial.map((e) => `${e.name} (${e.id})`);
    throw new RecipientError(
      `Recipient "${selector}" is ambiguous: ${candidates.join(", ")}`,
      candidates,
    );
  }
  throw new RecipientError(
    `No member matches "${selector}". Run "slack-share cache update" if they joined recently.`,
  );
}

// Name lookups follow the name map: the last entry with a given name wins.
function lastMatch(
  directory: Directory,
  predicate: (entry: DirectoryEntry) => boolean,
): DirectoryEntry | undefined {
  for (let i = directory.length - 1; i >= 0; i--) {
    const entry = directory[i];
    if (entry && predicate(entry)) {
      return entry;
    }
  }
  return undefined;
}
