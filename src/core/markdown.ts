import { existsSync, readdirSync, readFileSync, statSync } from "fs";
import { basename, extname, join, relative } from "path";
import { findDates } from "./temporal.js";

export interface MarkdownFileRef {
  path: string;
  /** Path relative to the configured directory it was found in. */
  relativePath: string;
}

export interface MarkdownSection {
  source: string;
  heading: string;
  content: string;
  /** First date in the heading, e.g. a journal entry titled "2024-03-10". */
  date?: string;
}

export interface DiscoveryOptions {
  recursive: boolean;
  extensions: readonly string[];
}

export interface DiscoveryResult {
  files: MarkdownFileRef[];
  missing: string[];
}

const HEADING = /^#{1,6}\s+(.*?)\s*#*\s*$/;
const FENCE = /^\s*(```|~~~)/;

/**
 * Find markdown files under each directory. Directories that do not exist
 * are reported in `missing`; hidden entries are skipped.
 */
export function discoverMarkdownFiles(
  directories: readonly string[],
  options: DiscoveryOptions
): DiscoveryResult {
  const extensions = new Set(options.extensions.map((e) => e.toLowerCase()));
  const files: MarkdownFileRef[] = [];
  const missing: string[] = [];

  for (const root of directories) {
    if (!existsSync(root) || !statSync(root).isDirectory()) {
      missing.push(root);
      continue;
    }
    walk(root, root, options.recursive, extensions, files);
  }

  return { files, missing };
}

function walk(
  root: string,
  dir: string,
  recursive: boolean,
  extensions: ReadonlySet<string>,
  out: MarkdownFileRef[]
): void {
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const entryPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (recursive) walk(root, entryPath, recursive, extensions, out);
      continue;
    }
    if (entry.isFile() && extensions.has(extname(entry.name).toLowerCase())) {
      out.push({ path: entryPath, relativePath: relative(root, entryPath) });
    }
  }
}

/** Strip inline markdown so the extractor sees plain sentences. */
function plainLine(line: string): string {
  return line
    .replace(/^\s*(?:[-*+]|\d+[.)])\s+(?:\[[ xX]\]\s+)?/, "")
    .replace(/^\s*>\s?/, "")
    .replace(/!?\[([^\]]*)\]\([^)]*\)/g, "$1")
    .replace(/`([^`]*)`/g, "$1")
    .replace(/(\*\*|__)(.+?)\1/g, "$2")
    .replace(/(?<![\p{L}\p{N}])[*_](.+?)[*_](?![\p{L}\p{N}])/gu, "$1")
    .trim();
}

function stripFrontMatter(lines: string[]): string[] {
  if (lines[0]?.trim() !== "---") return lines;
  const end = lines.findIndex((line, i) => i > 0 && line.trim() === "---");
  return end === -1 ? lines : lines.slice(end + 1);
}

/**
 * Split a markdown document at its headings. Text before the first heading
 * is titled after the file. Code blocks are dropped.
 */
export function splitSections(markdown: string, source: string): MarkdownSection[] {
  const sections: MarkdownSection[] = [];
  let heading = basename(source, extname(source));
  let body: string[] = [];
  let inFence = false;

  const flush = () => {
    const content = body.join("\n").trim();
    if (/\p{L}/u.test(content)) {
      const section: MarkdownSection = { source, heading, content };
      const date = findDates(heading)[0];
      if (date) section.date = date;
      sections.push(section);
    }
    body = [];
  };

  for (const line of stripFrontMatter(markdown.split(/\r?\n/))) {
    if (FENCE.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;

    const match = HEADING.exec(line);
    if (match) {
      flush();
      heading = plainLine(match[1]) || heading;
      continue;
    }

    if (/^\s*(?:-{3,}|\*{3,}|_{3,})\s*$/.test(line)) continue;
    const plain = plainLine(line);
    if (plain) body.push(plain);
  }
  flush();

  return sections;
}

export function readSections(file: MarkdownFileRef): MarkdownSection[] {
  return splitSections(readFileSync(file.path, "utf-8"), file.relativePath);
}

export function toBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
