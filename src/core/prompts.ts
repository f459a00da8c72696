import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import { PromptNotFoundError } from "./errors.js";
import { renderTemplate, type TemplateVars } from "./template.js";

/** `prompts/` at the package root, both from src/ (tsx) and dist/. */
export const DEFAULT_PROMPT_DIR = fileURLToPath(new URL("../../prompts/", import.meta.url));

const SEGMENT = /^[a-z0-9_-]+$/i;

/**
 * Loads prompt templates stored as `<dir>/<category>/<name>.txt` and renders
 * them. Template text is cached after the first read.
 */
export class PromptManager {
  private cache = new Map<string, string>();
  private dir: string;

  constructor(dir: string = DEFAULT_PROMPT_DIR) {
    this.dir = dir;
  }

  getTemplate(category: string, name: string): string {
    const cacheKey = `${category}/${name}`;
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) return cached;

    if (!SEGMENT.test(category) || !SEGMENT.test(name)) {
      throw new PromptNotFoundError(category, name);
    }

    const path = join(this.dir, category, `${name}.txt`);
    if (!existsSync(path)) {
      throw new PromptNotFoundError(category, name);
    }

    const text = readFileSync(path, "utf-8");
    this.cache.set(cacheKey, text);
    return text;
  }

  getPrompt(category: string, name: string, vars: TemplateVars = {}): string {
    return renderTemplate(this.getTemplate(category, name), vars);
  }
}
