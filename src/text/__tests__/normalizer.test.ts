import { describe, expect, it } from "vitest";
import { normalize } from "../normalizer";

describe("normalize", () => {
  it("unifies line endings, collapses blank runs and spaces, and trims", () => {
    expect(normalize("a\r\nb\r\rc\n\n\n\nd   e\t \nf ")).toBe("a\nb\n\nc\n\nd e\nf");
  });

  it("turns a lone carriage return into a newline", () => {
    expect(normalize("a\rb")).toBe("a\nb");
  });

  it("keeps at most one blank line", () => {
    expect(normalize("one\n\ntwo\n\n\n\n\nthree")).toBe("one\n\ntwo\n\nthree");
  });

  it("strips indentation and trailing blanks on every line", () => {
    expect(normalize("  first\t\n\t second  \n   third")).toBe("first\nsecond\nthird");
  });

  it("collapses tabs and spaces between words to one space", () => {
    expect(normalize("a\t\tb  \t c")).toBe("a b c");
  });

  it("trims surrounding blank lines", () => {
    expect(normalize("  \n\n hello \n\n  ")).toBe("hello");
  });

  it("leaves ideographic spacing inside the text untouched", () => {
    expect(normalize("他说：\u3000\u3000好。\n\u3000第二段")).toBe(
      "他说：\u3000\u3000好。\n\u3000第二段",
    );
  });

  it("trims Unicode whitespace at both ends", () => {
    expect(normalize("\u3000\u3000第一章\u3000")).toBe("第一章");
    expect(normalize("\u00a0x\u00a0")).toBe("x");
    expect(normalize("\u2028x\n")).toBe("x");
  });

  it("is idempotent", () => {
    const once = normalize("x \r\n\r\n\r\n  y\t\tz  ");
    expect(normalize(once)).toBe(once);
  });

  it("returns an empty string for whitespace-only input", () => {
    expect(normalize(" \t\r\n\n ")).toBe("");
  });
});
