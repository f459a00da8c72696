import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { mkdirSync, mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { discoverMarkdownFiles, splitSections, toBatches } from "../core/markdown.js";

describe("splitSections", () => {
  it("splits at headings and strips markdown syntax", () => {
    const markdown = [
      "---",
      "title: Notes",
      "---",
      "Intro line about **Bruce**.",
      "",
      "# 2024-03-10",
      "- Met [Alice](https://example.com) for coffee.",
      "```js",
      "const x = 1;",
      "```",
      "## Empty",
      "",
      "***",
      "## Food",
      "I love `sushi`.",
    ].join("\n");

    assert.deepEqual(splitSections(markdown, "journal/notes.md"), [
      { source: "journal/notes.md", heading: "notes", content: "Intro line about Bruce." },
      { source: "journal/notes.md", heading: "2024-03-10", content: "Met Alice for coffee.", date: "2024-03-10" },
      { source: "journal/notes.md", heading: "Food", content: "I love sushi." },
    ]);
  });

  it("returns nothing for a document without text", () => {
    assert.deepEqual(splitSections("# Title\n\n```\ncode only\n```\n", "empty.md"), []);
  });
});

describe("discoverMarkdownFiles", () => {
  const root = mkdtempSync(join(tmpdir(), "factkeeper-md-"));
  mkdirSync(join(root, "sub"));
  mkdirSync(join(root, ".hidden"));
  writeFileSync(join(root, "a.md"), "# A\nI love sushi.\n");
  writeFileSync(join(root, "notes.txt"), "not markdown");
  writeFileSync(join(root, "sub", "b.markdown"), "# B\nI love ramen.\n");
  writeFileSync(join(root, ".hidden", "c.md"), "# C\nI love tea.\n");

  it("walks subdirectories and skips hidden entries", () => {
    const { files, missing } = discoverMarkdownFiles([root], { recursive: true, extensions: [".md", ".markdown"] });
    assert.deepEqual(
      files.map((f) => f.relativePath),
      ["a.md", join("sub", "b.markdown")]
    );
    assert.deepEqual(missing, []);
  });

  it("stays at the top level when not recursive", () => {
    const { files } = discoverMarkdownFiles([root], { recursive: false, extensions: [".md", ".markdown"] });
    assert.deepEqual(
      files.map((f) => f.relativePath),
      ["a.md"]
    );
  });

  it("reports directories that do not exist", () => {
    const gone = join(root, "gone");
    assert.deepEqual(discoverMarkdownFiles([gone], { recursive: true, extensions: [".md"] }), {
      files: [],
      missing: [gone],
    });
  });
});

describe("toBatches", () => {
  it("keeps order and puts the remainder last", () => {
    assert.deepEqual(toBatches([1, 2, 3, 4, 5], 2), [[1, 2], [3, 4], [5]]);
    assert.deepEqual(toBatches([], 3), []);
  });
});
