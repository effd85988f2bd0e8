/**
 * Tests for identity resolution.
 */

import { describe, it, expect } from "vitest";
import {
  IdentityTable,
  displayTitle,
  generateBlockUuid,
  namespaceAncestors,
  normalizePageName,
  normalizeResourcePath,
  pageNameFromPath,
} from "./identity.js";
import { isUuid } from "./links.js";

describe("name normalization", () => {
  it("should case-fold and tidy page names", () => {
    expect(normalizePageName("  My   Page ")).toBe("my page");
    expect(normalizePageName("Projects / Alpha")).toBe("projects/alpha");
    expect(normalizePageName("a//b")).toBe("a/b");
    expect(normalizePageName("a.b", ".")).toBe("a.b");
  });

  it("should keep case in display titles", () => {
    expect(displayTitle("Projects / Alpha")).toBe("Projects/Alpha");
  });

  it("should normalize resource paths but keep URLs", () => {
    expect(normalizeResourcePath("./images/../images/cat.png")).toBe(
      "images/cat.png",
    );
    expect(normalizeResourcePath("a\\B.png")).toBe("a/B.png");
    expect(normalizeResourcePath("https://example.com/A")).toBe(
      "https://example.com/A",
    );
    expect(normalizeResourcePath(".")).toBe("");
  });

  it("should list namespace ancestors nearest first", () => {
    expect(namespaceAncestors("a/b/c")).toEqual(["a/b", "a"]);
    expect(namespaceAncestors("a")).toEqual([]);
  });
});

describe("pageNameFromPath", () => {
  const options = { pageDirs: ["pages", "journals"] };

  it("should read ___ as a namespace separator", () => {
    expect(pageNameFromPath("pages/projects___alpha.md", options)).toBe(
      "projects/alpha",
    );
  });

  it("should use directories as namespaces", () => {
    expect(pageNameFromPath("projects/alpha.md", options)).toBe("projects/alpha");
  });

  it("should decode percent escapes", () => {
    expect(pageNameFromPath("pages/My%20Page.md", options)).toBe("My Page");
    expect(pageNameFromPath("notes/100%.md", options)).toBe("notes/100%");
    expect(pageNameFromPath("bad%E0%A4.md", options)).toBe("bad%E0%A4");
  });

  it("should read an encoded slash as a namespace separator", () => {
    expect(pageNameFromPath("pages/a%2Fb.md", options)).toBe("a/b");
    expect(pageNameFromPath("pages/a%2fb___c.md", options)).toBe("a/b/c");
  });
});

describe("generateBlockUuid", () => {
  it("should be deterministic and well-formed", () => {
    const a = generateBlockUuid("page", "page.md", [0, 1]);
    expect(a).toBe(generateBlockUuid("page", "page.md", [0, 1]));
    expect(isUuid(a)).toBe(true);
    expect(a[14]).toBe("5");
    expect(generateBlockUuid("page", "page.md", [1, 0])).not.toBe(a);
    expect(generateBlockUuid("page", "page.md", [0, 1], 1)).not.toBe(a);
  });
});

describe("IdentityTable", () => {
  it("should create placeholders with their namespace ancestors", () => {
    const table = new IdentityTable();
    const page = table.reference("Projects/Alpha");

    expect(page).toEqual({
      name: "projects/alpha",
      title: "Projects/Alpha",
      isPlaceholder: true,
      isPublic: false,
      file: null,
    });
    expect(table.pageList().map((p) => [p.name, p.title])).toEqual([
      ["projects", "Projects"],
      ["projects/alpha", "Projects/Alpha"],
    ]);
  });

  it("should return the same entry for equivalent names", () => {
    const table = new IdentityTable();
    expect(table.reference("My Page")).toBe(table.reference("my  page"));
  });

  it("should return null for empty names", () => {
    const table = new IdentityTable();
    expect(table.reference(" / ")).toBeNull();
    expect(table.author("   ", "x.md")).toBeNull();
  });

  it("should promote placeholders in place", () => {
    const table = new IdentityTable();
    const placeholder = table.reference("Projects/Alpha");
    const result = table.author("projects/alpha", "projects/alpha.md");

    expect(result?.page).toBe(placeholder);
    expect(result?.promoted).toBe(true);
    expect(result?.merged).toBe(false);
    expect(placeholder?.isPlaceholder).toBe(false);
    expect(placeholder?.title).toBe("projects/alpha");
    expect(placeholder?.file).toBe("projects/alpha.md");
  });

  it("should report a second author as a merge", () => {
    const table = new IdentityTable();
    const first = table.author("My Page", "My Page.md");
    const second = table.author("my page", "pages/my page.md");

    expect(first?.promoted).toBe(false);
    expect(second?.merged).toBe(true);
    expect(second?.page.file).toBe("My Page.md");
  });

  it("should mark pages public", () => {
    const table = new IdentityTable();
    table.reference("Doc");
    table.markPublic("doc");
    expect(table.getPage("DOC")?.isPublic).toBe(true);
  });

  it("should keep resources asset once marked", () => {
    const table = new IdentityTable();
    const first = table.resource("./a.png", false);
    table.resource("a.png", true);
    table.resource("a.png", false);

    expect(first).toEqual({ path: "a.png", isAsset: true });
    expect(table.resourceList()).toHaveLength(1);
    expect(table.resource(".", true)).toBeNull();
  });

  it("should claim each valid block uuid once", () => {
    const table = new IdentityTable();
    const uuid = "6f1c7e2a-0000-4000-8000-000000000001";

    expect(table.claimBlock("nope", "p")).toBe(false);
    expect(table.claimBlock(uuid, "p")).toBe(true);
    expect(table.claimBlock(uuid.toUpperCase(), "q")).toBe(false);
    expect(table.hasBlock(uuid.toUpperCase())).toBe(true);
  });

  it("should list namespace pairs for every ancestor", () => {
    const table = new IdentityTable();
    table.reference("a/b/c");

    expect(table.namespacePairs()).toEqual([
      { child: "a/b", ancestor: "a" },
      { child: "a/b/c", ancestor: "a/b" },
      { child: "a/b/c", ancestor: "a" },
    ]);
  });
});
