import { describe, expect, it } from "vitest";
import { decodeRitualCallback, encodeRitualCallback, resolveOutcome } from "../src/responseTokens.js";

describe("resolveOutcome", () => {
  it("maps the shared token table", () => {
    expect(resolveOutcome("ready")).toBe("COMPLETED");
    expect(resolveOutcome("sleepy")).toBe("SKIPPED");
    expect(resolveOutcome("planning")).toBe("PARTIAL");
  });

  it("falls back to the ritual's buttons, then to completed", () => {
    const buttons = [{ label: "Позже", token: "later", outcome: "SKIPPED" as const }];
    expect(resolveOutcome("later", buttons)).toBe("SKIPPED");
    expect(resolveOutcome("unknown", buttons)).toBe("COMPLETED");
    expect(resolveOutcome(null)).toBe("COMPLETED");
  });

  it("ignores object prototype keys in the shared table", () => {
    const buttons = [{ label: "Нет", token: "constructor", outcome: "SKIPPED" as const }];
    expect(resolveOutcome("constructor", buttons)).toBe("SKIPPED");
    expect(resolveOutcome("constructor")).toBe("COMPLETED");
    expect(resolveOutcome("__proto__")).toBe("COMPLETED");
    expect(resolveOutcome("tostring")).toBe("COMPLETED");
  });
});

describe("ritual callbacks", () => {
  it("decodes what it encodes", () => {
    const data = encodeRitualCallback("7b1c2f9e-0000-4000-8000-000000000001", "ready");
    expect(data).toBe("rit:7b1c2f9e-0000-4000-8000-000000000001:ready");
    expect(decodeRitualCallback(data)).toEqual({ userRitualId: "7b1c2f9e-0000-4000-8000-000000000001", token: "ready" });
  });

  it("rejects foreign or malformed data", () => {
    expect(decodeRitualCallback("tog:abc:1")).toBeNull();
    expect(decodeRitualCallback("rit:abc:Ready")).toBeNull();
    expect(decodeRitualCallback("rit:abc:ready:extra")).toBeNull();
    expect(decodeRitualCallback("rit::ready")).toBeNull();
  });

  it("passes prototype-like tokens through as plain strings", () => {
    expect(decodeRitualCallback("rit:abc:constructor")).toEqual({ userRitualId: "abc", token: "constructor" });
  });
});
