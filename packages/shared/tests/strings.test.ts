import { describe, it, expect } from "vitest";
import { coerceTrimmedString, formatUnknown, lastLines, splitLines } from "../src/lib/strings.js";

describe("formatUnknown", () => {
  it("prefers error messages", () => {
    expect(formatUnknown(new Error("  dnf failed  "))).toBe("dnf failed");
  });

  it("handles primitives, objects and fallbacks", () => {
    expect(formatUnknown(42)).toBe("42");
    expect(formatUnknown({ code: "E1" })).toBe('{"code":"E1"}');
    expect(formatUnknown({}, "unknown error")).toBe("unknown error");
    expect(formatUnknown(new Error(""), "unknown error")).toBe("unknown error");
  });
});

describe("line helpers", () => {
  it("drops blank lines", () => {
    expect(splitLines("a\r\n\nb  \n")).toEqual(["a", "b"]);
  });

  it("keeps the last lines", () => {
    expect(lastLines("1\n2\n3\n4\n", 2)).toEqual(["3", "4"]);
    expect(lastLines("1\n2\n", 10)).toEqual(["1", "2"]);
    expect(lastLines("1\n2\n", 0)).toEqual([]);
  });

  it("coerces to trimmed strings", () => {
    expect(coerceTrimmedString("  x ")).toBe("x");
    expect(coerceTrimmedString(null)).toBe("");
    expect(coerceTrimmedString(true)).toBe("true");
  });
});
