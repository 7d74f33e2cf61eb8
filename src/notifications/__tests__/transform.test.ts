import { describe, expect, it } from "vitest";
import { buildWebhookPayload, truncateContent } from "../transform.js";

describe("truncateContent", () => {
  it("returns short content unchanged", () => {
    expect(truncateContent("Bin is full")).toBe("Bin is full");
  });

  it("cuts long content to the limit with an ellipsis", () => {
    const result = truncateContent("abcdefghij", 5);

    expect(result).toBe("abcd…");
    expect(result).toHaveLength(5);
  });
});

describe("buildWebhookPayload", () => {
  it("wraps the message as content", () => {
    expect(buildWebhookPayload("hello")).toEqual({ content: "hello" });
  });

  it("keeps payloads within the webhook limit", () => {
    expect(buildWebhookPayload("x".repeat(2500)).content).toHaveLength(2000);
  });
});
