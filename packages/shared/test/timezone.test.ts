import { describe, expect, it } from "vitest";
import { fmtUtcOffset, parseUtcOffsetHours } from "../src/timezone.js";

describe("parseUtcOffsetHours", () => {
  it.each([
    ["GMT+3", 3],
    ["UTC-05", -5],
    [" +3 ", 3],
    ["3", 3],
    ["GMT+3:00", 3],
    ["минус 4", -4],
    ["GMT плюс 5", 5]
  ])("reads %s as %i", (input, expected) => {
    expect(parseUtcOffsetHours(input)).toBe(expected);
  });

  it.each(["", "GMT+15", "GMT-13", "Europe/Moscow", "GMT+3:30"])("rejects %j", (input) => {
    expect(parseUtcOffsetHours(input)).toBeNull();
  });

  it("formats offsets", () => {
    expect(fmtUtcOffset(-5)).toBe("GMT-5");
    expect(fmtUtcOffset(0)).toBe("GMT+0");
  });
});
