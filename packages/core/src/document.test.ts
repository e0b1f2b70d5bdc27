import { describe, it, expect } from "vitest";
import { buildDocument, deriveExcerpt } from "./document.js";
import { extractCodeBlocks } from "./code-blocks.js";
import {
  MalformedFrontMatterError,
  MissingLayoutError,
  UnbalancedCodeFenceError,
  UnknownLayoutError,
  InvalidPermalinkError,
} from "./errors.js";
import type { SourceFile } from "./types.js";

const source: SourceFile = {
  id: "2012-01-28-hello-world",
  fileName: "2012-01-28-hello-world.md",
  path: "/site/_posts/2012-01-28-hello-world.md",
  date: { year: 2012, month: 1, day: 28, iso: "2012-01-28" },
  slug: "hello-world",
  ext: "md",
};

const withLayout = { defaultLayout: "post", layouts: ["default", "page", "post"] };

describe("buildDocument", () => {
  it("should derive fields from front matter and filename", () => {
    const { document, diagnostics } = buildDocument(
      source,
      "---\ntitle: Hello\ntags: [a, b]\n---\nFirst paragraph.\n\nSecond.\n",
      withLayout
    );

    expect(diagnostics).toEqual([]);
    expect(document).toMatchObject({
      id: "2012-01-28-hello-world",
      sourcePath: "/site/_posts/2012-01-28-hello-world.md",
      slug: "hello-world",
      title: "Hello",
      excerpt: "First paragraph.",
      permalink: "/2012/01/28/hello-world/",
      layout: "post",
      tags: ["a", "b"],
      categories: [],
      published: true,
      rawBody: "First paragraph.\n\nSecond.\n",
    });
  });

  it("should title the document from its slug when front matter has none", () => {
    expect(buildDocument(source, "Body\n", withLayout).document.title).toBe("Hello World");
  });

  it("should extract code before resolving references", () => {
    const { document } = buildDocument(
      source,
      "```\n[1]: http://wrong.example\n```\n\nSee [x][1].\n\n[1]: /right\n",
      withLayout
    );

    expect(document.body).toBe("\uE000B0\uE001\n\nSee [x](/right).\n");
    expect(document.codeBlocks[0].text).toBe("[1]: http://wrong.example\n");
    expect(document.definitions).toEqual([{ label: "1", key: "1", target: "/right", line: 5 }]);
    expect(document.links).toEqual([{ text: "x", label: "1", target: "/right", image: false }]);
    expect(document.excerpt).toBe("See [x](/right).");
  });

  it("should report unresolved references without failing", () => {
    const { document, diagnostics } = buildDocument(source, "[a][missing]\n", withLayout);

    expect(document.body).toBe("[a][missing]\n");
    expect(diagnostics).toEqual([
      {
        code: "UNRESOLVED_REFERENCE",
        documentId: "2012-01-28-hello-world",
        message: "No definition for reference [missing] in 2012-01-28-hello-world",
        details: { label: "missing", text: "a" },
      },
    ]);
  });

  it("should report a missing layout when there is no default", () => {
    const { document, diagnostics } = buildDocument(source, "Body\n");

    expect(document.layout).toBeUndefined();
    expect(diagnostics).toEqual([
      {
        code: "MISSING_LAYOUT",
        documentId: "2012-01-28-hello-world",
        message:
          "Document 2012-01-28-hello-world declares no layout and no default layout is configured",
      },
    ]);
  });

  it("should fail on a missing layout in strict mode", () => {
    expect(() => buildDocument(source, "Body\n", { strict: true })).toThrow(MissingLayoutError);
  });

  it("should fail on a layout outside the known set", () => {
    expect(() => buildDocument(source, "---\nlayout: fancy\n---\nBody\n", withLayout)).toThrow(
      UnknownLayoutError
    );
    expect(() => buildDocument(source, "---\nlayout: fancy\n---\nBody\n", withLayout)).toThrow(
      'Unknown layout "fancy" (known layouts: default, page, post)'
    );
  });

  it("should prefer a declared layout over the default", () => {
    const { document } = buildDocument(source, "---\nlayout: page\n---\nBody\n", withLayout);
    expect(document.layout).toBe("page");
  });

  it("should cut the excerpt of a CRLF source at the first blank line", () => {
    const { document } = buildDocument(
      source,
      "---\r\ntitle: T\r\n---\r\nFirst para.\r\n\r\nSecond para.\r\n",
      withLayout
    );

    expect(document.title).toBe("T");
    expect(document.excerpt).toBe("First para.");
  });

  it("should reject a permalink that climbs out of the site", () => {
    const build = (): unknown => buildDocument(source, "---\npermalink: /../../x/\n---\nBody\n", withLayout);

    expect(build).toThrow(InvalidPermalinkError);
    expect(build).toThrow("Permalink /../../x/ of 2012-01-28-hello-world points outside the site");
  });

  it("should reject an encoded parent segment too", () => {
    expect(() => buildDocument(source, "---\npermalink: /%2E%2E/x/\n---\nBody\n", withLayout)).toThrow(
      InvalidPermalinkError
    );
  });

  it("should honor permalink and excerpt from front matter", () => {
    const { document } = buildDocument(
      source,
      "---\npermalink: about\nexcerpt: Short\n---\nLong body\n",
      withLayout
    );

    expect(document.permalink).toBe("/about");
    expect(document.excerpt).toBe("Short");
  });

  it("should expand categories into the permalink pattern", () => {
    const { document } = buildDocument(source, "---\ncategories: dev notes\n---\nBody\n", {
      ...withLayout,
      permalink: "/:categories/:slug/",
    });

    expect(document.categories).toEqual(["dev", "notes"]);
    expect(document.permalink).toBe("/dev/notes/hello-world/");
  });

  it("should mark documents with published: false", () => {
    const { document } = buildDocument(source, "---\npublished: false\n---\nBody\n", withLayout);
    expect(document.published).toBe(false);
  });

  it("should return a deeply frozen document", () => {
    const { document } = buildDocument(source, "---\ntags: [a]\n---\nBody\n", withLayout);

    expect(Object.isFrozen(document)).toBe(true);
    expect(Object.isFrozen(document.tags)).toBe(true);
    expect(Object.isFrozen(document.metadata)).toBe(true);
  });

  it("should build identical documents from identical input", () => {
    const content = "---\ntitle: Same\n---\nText with `code` and [a][b].\n\n[b]: /b\n";
    expect(buildDocument(source, content, withLayout)).toEqual(buildDocument(source, content, withLayout));
  });

  it("should propagate fatal parse errors", () => {
    expect(() => buildDocument(source, "---\ntitle: x\n", withLayout)).toThrow(MalformedFrontMatterError);
    expect(() => buildDocument(source, "```\nopen\n", withLayout)).toThrow(UnbalancedCodeFenceError);
  });
});

describe("deriveExcerpt", () => {
  it("should restore inline code in the excerpt", () => {
    const { segments, blocks } = extractCodeBlocks("Use `x` here.\n\nMore.\n");
    expect(deriveExcerpt(segments, blocks)).toBe("Use `x` here.");
  });

  it("should match a separator against CRLF text", () => {
    const { segments, blocks } = extractCodeBlocks("One\r\ntwo\r\n\r\nthree\r\n");
    expect(deriveExcerpt(segments, blocks)).toBe("One\ntwo");
  });

  it("should cut at a custom separator", () => {
    const { segments, blocks } = extractCodeBlocks("Intro <!--more--> rest\n");
    expect(deriveExcerpt(segments, blocks, "<!--more-->")).toBe("Intro");
  });

  it("should skip leading code blocks", () => {
    const { segments, blocks } = extractCodeBlocks("```\ncode\n```\n\nAfter code.\n");
    expect(deriveExcerpt(segments, blocks)).toBe("After code.");
  });

  it("should return an empty excerpt for code-only bodies", () => {
    const { segments, blocks } = extractCodeBlocks("```\ncode\n```\n");
    expect(deriveExcerpt(segments, blocks)).toBe("");
  });
});
