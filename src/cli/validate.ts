import { InvalidArgumentError } from "commander";
import { getLexicon } from "../core/lexicon.js";
import { detectLanguage } from "../core/text.js";
import { FactValidator, VALIDATION_RULES, buildValidationPrompt } from "../core/validator.js";
import type { Fact, ValidationCriteria, ValidationFormat, ValidationRule } from "../types.js";
import { readInput } from "./util.js";

export interface ValidateOptions {
  file?: string;
  disable: string[];
  format: ValidationFormat;
  prompt?: boolean;
}

function isRule(value: string): value is ValidationRule {
  return VALIDATION_RULES.some((rule) => rule === value);
}

export function parseRules(value: string, previous: string[] = []): string[] {
  const rules = value.split(",").map((r) => r.trim()).filter(Boolean);
  for (const rule of rules) {
    if (!isRule(rule)) {
      throw new InvalidArgumentError(`Unknown rule "${rule}"; expected one of ${VALIDATION_RULES.join(", ")}`);
    }
  }
  return [...previous, ...rules];
}

export function parseFormat(value: string): ValidationFormat {
  if (value === "sections" || value === "json") return value;
  throw new InvalidArgumentError(`Unknown format "${value}"; expected sections or json`);
}

/**
 * Facts come from the arguments, or one per line from --file. With --prompt
 * the filled-in model prompt is printed instead of the verdict.
 */
export function validateCommand(facts: string[], options: ValidateOptions): void {
  const lines = facts.length > 0 ? facts : readInput({ file: options.file }).split(/\r?\n/);
  const lexicon = getLexicon();
  const candidates: Fact[] = lines
    .map((line) => line.trim())
    .filter(Boolean)
    .map((text) => ({ text, language: detectLanguage(text, lexicon) }));

  const criteria: ValidationCriteria = {};
  for (const rule of options.disable) {
    if (isRule(rule)) criteria[rule] = false;
  }

  if (options.prompt) {
    console.log(buildValidationPrompt(candidates, { criteria, format: options.format }));
    return;
  }
  console.log(new FactValidator().report(candidates, { criteria, format: options.format }));
}
