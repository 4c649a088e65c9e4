import { describe, expect, test } from "vitest";
import type { Directory } from "../src/directory/schema.ts";
import { isConversationId, resolveRecipient } from "../src/share/recipient.ts";
import { RecipientError } from "../src/lib/errors.ts";

describe("resolveRecipient", () => {
  const directory: Directory = [
    { id: "U01ALICE01", team: "T1", name: "Alice Smith" },
    { id: "U01ALICE02", team: "T1", name: "Alice Jones" },
    { id: "U01BOB0001", team: "T1", name: "Bob" },
    { id: "U01BOB0002", team: "T2", name: "Bob" },
  ];

  test("matches a cached member id", () => {
    const result = resolveRecipient(directory, "U01BOB0001");
    expect(result).toEqual({ kind: "entry", id: "U01BOB0001", entry: directory[2] });
  });

  test("passes through ids that are not in the directory", () => {
    expect(resolveRecipient(directory, "C0123456789")).toEqual({ kind: "id", id: "C0123456789" });
  });

  test("a name shaped like an id still resolves to the member", () => {
    const withIdLikeName: Directory = [{ id: "U01WILL001", team: "T1", name: "WILLIAMSON" }];
    expect(resolveRecipient(withIdLikeName, "WILLIAMSON")).toEqual({
      kind: "entry",
      id: "U01WILL001",
      entry: withIdLikeName[0],
    });
  });

  test("exact name picks the last member with that name", () => {
    expect(resolveRecipient(directory, "Bob").id).toBe("U01BOB0002");
  });

  test("name match ignores case and a leading @", () => {
    expect(resolveRecipient(directory, "@alice smith").id).toBe("U01ALICE01");
  });

  test("matches a unique substring", () => {
    expect(resolveRecipient(directory, "jon").id).toBe("U01ALICE02");
  });

  test("reports ambiguity with candidates", () => {
    try {
      resolveRecipient(directory, "alice");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RecipientError);
      expect(err).toMatchObject({
        candidates: ["Alice Smith (U01ALICE01)", "Alice Jones (U01ALICE02)"],
      });
    }
  });

  test("reports no match", () => {
    expect(() => resolveRecipient(directory, "carol")).toThrow('No member matches "carol".');
  });

  test("rejects an empty selector", () => {
    expect(() => resolveRecipient(directory, "  ")).toThrow("Recipient is empty");
  });
});

describe("isConversationId", () => {
  test("accepts user, channel and DM ids", () => {
    expect(isConversationId("U01ABCDEFG")).toBe(true);
    expect(isConversationId("W01ABCDEFG")).toBe(true);
    expect(isConversationId("C01ABCDEFG")).toBe(true);
    expect(isConversationId("D01ABCDEFG")).toBe(true);
  });

  test("rejects names and short ids", () => {
    expect(isConversationId("general")).toBe(false);
    expect(isConversationId("C123")).toBe(false);
  });
});
