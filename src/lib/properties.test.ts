/**
 * Tests for property and tag parsing.
 */

import { describe, it, expect } from "vitest";
import {
  parsePropertyLine,
  normalizeKey,
  isTruthy,
  splitTagList,
  collectTags,
  hasTrueProperty,
  readFrontMatter,
} from "./properties.js";

describe("parsePropertyLine", () => {
  it("should parse a key and value", () => {
    expect(parsePropertyLine("Status:: Done")).toEqual({
      field: "Status",
      key: "status",
      value: "Done",
    });
  });

  it("should allow an empty value", () => {
    expect(parsePropertyLine("archived::")?.value).toBe("");
  });

  it("should keep later separators in the value", () => {
    expect(parsePropertyLine("a:: b:: c")?.value).toBe("b:: c");
  });

  it("should require whitespace after the separator", () => {
    expect(parsePropertyLine("key::value")).toBeNull();
  });

  it("should not treat URLs as properties", () => {
    expect(parsePropertyLine("http://example.com")).toBeNull();
  });
});

describe("normalizeKey", () => {
  it("should lowercase and collapse whitespace", () => {
    expect(normalizeKey("  Due   Date ")).toBe("due date");
  });
});

describe("isTruthy", () => {
  it("should accept the usual true spellings", () => {
    expect(isTruthy("Yes")).toBe(true);
    expect(isTruthy(" true ")).toBe(true);
    expect(isTruthy("no")).toBe(false);
    expect(isTruthy("")).toBe(false);
  });
});

describe("splitTagList", () => {
  it("should split plain, bracketed and hashed tags", () => {
    expect(splitTagList("a, [[b, c]], #d, #[[E f]]")).toEqual([
      "a",
      "b, c",
      "d",
      "E f",
    ]);
  });

  it("should drop empty entries", () => {
    expect(splitTagList(" , x ,")).toEqual(["x"]);
  });
});

describe("collectTags and hasTrueProperty", () => {
  const properties = [
    { field: "tags", key: "tags", value: "alpha, beta" },
    { field: "Tags", key: "tags", value: "gamma" },
    { field: "public", key: "public", value: "true" },
  ];

  it("should gather tags from every tags property", () => {
    expect(collectTags(properties, "tags")).toEqual(["alpha", "beta", "gamma"]);
  });

  it("should find true flags by key", () => {
    expect(hasTrueProperty(properties, "public")).toBe(true);
    expect(hasTrueProperty(properties, "heading")).toBe(false);
  });
});

describe("readFrontMatter", () => {
  it("should pass through notes without front matter", () => {
    const result = readFrontMatter("- a block\n");
    expect(result).toEqual({ properties: [], body: "- a block\n", lineOffset: 0 });
  });

  it("should read YAML values as page properties", () => {
    const source =
      "---\ntitle: Hello\ntags: [a, b]\ndate: 2024-01-05\n---\n- body line\n";
    const result = readFrontMatter(source);

    expect(result.properties).toEqual([
      { field: "title", key: "title", value: "Hello" },
      { field: "tags", key: "tags", value: "a, b" },
      { field: "date", key: "date", value: "2024-01-05" },
    ]);
    expect(result.body).toBe("- body line\n");
    expect(result.lineOffset).toBe(5);
  });

  it("should read an unclosed delimiter as a horizontal rule", () => {
    const source = "---\n- first [[x]]\n- second";
    expect(readFrontMatter(source)).toEqual({
      properties: [],
      body: source,
      lineOffset: 0,
    });
  });

  it("should not take a longer dash line for a delimiter", () => {
    const source = "----\ntitle: x\n---\n- a";
    expect(readFrontMatter(source).body).toBe(source);
  });

  it("should throw when the front matter is not a mapping", () => {
    expect(() => readFrontMatter("---\n- a\n- b\n---\n- c")).toThrow(
      "front matter is not a key/value mapping",
    );
  });

  it("should throw on malformed YAML", () => {
    expect(() => readFrontMatter("---\nkey: [unclosed\n---\nbody\n")).toThrow();
  });
});
