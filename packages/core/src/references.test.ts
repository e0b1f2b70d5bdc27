import { describe, it, expect } from "vitest";
import { resolveReferences, collectDefinitions, normalizeLabel } from "./references.js";
import { extractCodeBlocks } from "./code-blocks.js";
import { AmbiguousReferenceError } from "./errors.js";

describe("normalizeLabel", () => {
  it("should fold case and collapse whitespace", () => {
    expect(normalizeLabel("  Foo   Bar ")).toBe("foo bar");
    expect(normalizeLabel("Foo\tBar")).toBe("foo bar");
  });

  it("should fold sharp s and final sigma", () => {
    expect(normalizeLabel("STRASSE")).toBe("strasse");
    expect(normalizeLabel("Straße")).toBe("strasse");
    expect(normalizeLabel("ΟΔΟΣ")).toBe(normalizeLabel("οδοσ"));
  });
});

describe("collectDefinitions", () => {
  it("should strip definition lines and trailing blank lines", () => {
    const result = collectDefinitions("Text\n\n[a]: /a\n[b]: /b\n");

    expect(result.text).toBe("Text\n");
    expect([...result.definitions.keys()]).toEqual(["a", "b"]);
  });

  it("should leave text without definitions unchanged", () => {
    const text = "No refs here\n\n";
    expect(collectDefinitions(text).text).toBe(text);
  });

  it("should read bracketed targets and all title styles", () => {
    const { definitions } = collectDefinitions(
      "[one]: <my file.html> \"Double\"\n[two]: /two 'Single'\n[three]: /three (Paren)\n"
    );

    expect(definitions.get("one")).toEqual({
      label: "one",
      key: "one",
      target: "my file.html",
      title: "Double",
      line: 1,
    });
    expect(definitions.get("two")?.title).toBe("Single");
    expect(definitions.get("three")?.title).toBe("Paren");
  });

  it("should reject a label defined twice, ignoring case", () => {
    expect(() => collectDefinitions("[a]: /1\n[A]: /2\n")).toThrow(AmbiguousReferenceError);
    expect(() => collectDefinitions("[a]: /1\n[A]: /2\n")).toThrow(
      'Reference "[A]" is defined more than once (lines 1 and 2)'
    );
  });

  it("should read a title from the following line", () => {
    const result = collectDefinitions('[a]: /a\n  "Title here"\n[b]: /b\nText\n');

    expect(result.definitions.get("a")).toEqual({ label: "a", key: "a", target: "/a", title: "Title here", line: 1 });
    expect(result.definitions.get("b")?.line).toBe(3);
    expect(result.text).toBe("Text\n");
  });

  it("should read definitions from CRLF text", () => {
    const result = collectDefinitions('Text\r\n\r\n[a]: /a "A"\r\n');

    expect(result.definitions.get("a")?.title).toBe("A");
    expect(result.text).toBe("Text\n");
  });

  it("should reject a duplicate even when targets agree", () => {
    expect(() => collectDefinitions("[a]: /same\n\n[a]: /same\n")).toThrow(AmbiguousReferenceError);
  });
});

describe("resolveReferences", () => {
  it("should match labels that differ by case folding", () => {
    const result = resolveReferences("[x][STRASSE]\n\n[straße]: http://e.com\n");

    expect(result.unresolved).toEqual([]);
    expect(result.text).toBe("[x](http://e.com)\n");
  });

  it("should restore inline code inside definition titles and labels", () => {
    const extracted = extractCodeBlocks('[a][1] and [`cfg`]\n\n[1]: http://e.com "uses `x` ok"\n[`cfg`]: /cfg\n');
    const result = resolveReferences(extracted.text, extracted.blocks);

    expect(result.definitions.map((d) => [d.label, d.target, d.title])).toEqual([
      ["1", "http://e.com", "uses `x` ok"],
      ["`cfg`", "/cfg", undefined],
    ]);
    expect(result.links[1]).toEqual({ text: "`cfg`", label: "`cfg`", target: "/cfg", image: false });
    expect(result.text.startsWith('[a](http://e.com "uses `x` ok") and [')).toBe(true);
  });

  it("should resolve a full reference with a title", () => {
    const result = resolveReferences('See [here][1].\n\n[1]: http://example.com "Example"');

    expect(result.text).toBe('See [here](http://example.com "Example").\n');
    expect(result.links).toEqual([
      { text: "here", label: "1", target: "http://example.com", title: "Example", image: false },
    ]);
    expect(result.unresolved).toEqual([]);
  });

  it("should match labels that differ only in case", () => {
    expect(resolveReferences("[Foo][BAR]\n\n[bar]: /b\n").text).toBe("[Foo](/b)\n");
  });

  it("should resolve collapsed and shortcut references", () => {
    const result = resolveReferences("[Example][] and [Home]\n\n[example]: /e\n[home]: /\n");

    expect(result.text).toBe("[Example](/e) and [Home](/)\n");
    expect(result.links.map((l) => l.label)).toEqual(["Example", "Home"]);
  });

  it("should allow a definition after its use", () => {
    expect(resolveReferences("[a]: /a\n\nUse [x][a]\n").text).toBe("\nUse [x](/a)\n");
  });

  it("should leave an unknown full label literal and report it", () => {
    const result = resolveReferences("[x][nope]\n");

    expect(result.text).toBe("[x][nope]\n");
    expect(result.unresolved).toEqual([{ text: "x", label: "nope" }]);
  });

  it("should not report unknown shortcut brackets", () => {
    const result = resolveReferences("[just brackets]\n");

    expect(result.text).toBe("[just brackets]\n");
    expect(result.unresolved).toEqual([]);
  });

  it("should not touch inline links", () => {
    expect(resolveReferences("[t](http://x) and [r]\n\n[r]: /r\n").text).toBe(
      "[t](http://x) and [r](/r)\n"
    );
  });

  it("should not touch escaped brackets", () => {
    expect(resolveReferences("\\[not][r]\n\n[r]: /r\n").text).toBe("\\[not][r]\n");
  });

  it("should resolve image references", () => {
    const result = resolveReferences("![logo][img]\n\n[img]: /logo.png\n");

    expect(result.text).toBe("![logo](/logo.png)\n");
    expect(result.links[0].image).toBe(true);
  });

  it("should resolve an image reference nested in link text", () => {
    const result = resolveReferences("[![badge][img]][home]\n\n[img]: /b.svg\n[home]: /\n");

    expect(result.text).toBe("[![badge](/b.svg)](/)\n");
    expect(result.links.map((l) => l.target)).toEqual(["/b.svg", "/"]);
  });

  it("should wrap destinations with spaces in angle brackets", () => {
    expect(resolveReferences("[t][s]\n\n[s]: <my file.html>\n").text).toBe("[t](<my file.html>)\n");
  });

  it("should escape quotes in titles", () => {
    expect(resolveReferences("[q][q]\n\n[q]: /q 'He said \"hi\"'\n").text).toBe(
      '[q](/q "He said \\"hi\\"")\n'
    );
  });

  it("should return definitions in line order", () => {
    const result = resolveReferences("[b]: /b\n[a]: /a\n");

    expect(result.text).toBe("");
    expect(result.definitions.map((d) => [d.label, d.line])).toEqual([
      ["b", 1],
      ["a", 2],
    ]);
  });
});
