import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { DiagnosticReport, ErrorClassification, ErrorEvent } from "../types.js";
import { listPlaceholders, renderTemplate } from "./template.js";
import { containsPhrase } from "./text.js";

const TABLE_PATH = fileURLToPath(new URL("../../data/diagnostics.json", import.meta.url));

/** Tie-break order. */
export const CLASSIFICATIONS: readonly ErrorClassification[] = [
  "connection",
  "configuration",
  "data",
  "logic",
];

const STATE_SUMMARY_LIMIT = 500;
const TEMPLATE_VARS = new Set(["operation", "timestamp"]);

const templated = z.string().refine(
  (text) => {
    try {
      return listPlaceholders(text).every((name) => TEMPLATE_VARS.has(name));
    } catch {
      return false;
    }
  },
  { message: "only ${operation} and ${timestamp} may be used" }
);

const CategorySchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
  rootCauses: z.array(templated).min(1),
  impact: templated,
  resolutionSteps: z.array(templated).min(1),
  prevention: z.array(templated).min(1),
});

const TableSchema = z.object({
  connection: CategorySchema,
  configuration: CategorySchema,
  data: CategorySchema,
  logic: CategorySchema,
});

export type DiagnosticTable = z.infer<typeof TableSchema>;

export function loadDiagnosticTable(path: string = TABLE_PATH): DiagnosticTable {
  return TableSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
}

export function summarizeState(state: unknown): string {
  if (state === undefined || state === null) return "no state captured";

  let text: string;
  if (typeof state === "string") {
    text = state;
  } else {
    try {
      text = JSON.stringify(state) ?? String(state);
    } catch {
      // circular structures, BigInt values
      text = Object.prototype.toString.call(state);
    }
  }
  return text.length > STATE_SUMMARY_LIMIT ? `${text.slice(0, STATE_SUMMARY_LIMIT)}…` : text;
}

/**
 * Read-only diagnosis of a failed operation. Classifies by keyword weight
 * (a multi-word keyword outweighs a single word) and fills the report from
 * the category table. Never throws.
 */
export class ErrorDiagnostician {
  private table: DiagnosticTable;

  constructor(table: DiagnosticTable = loadDiagnosticTable()) {
    this.table = table;
  }

  diagnose(event: ErrorEvent): DiagnosticReport {
    const operation = event.operation.trim() || "unknown";
    const timestamp = event.timestamp.trim() || new Date().toISOString();
    const haystack = `${event.errorMessage} ${operation}`.toLowerCase();

    let best: ErrorClassification = "logic";
    let bestScore = 0;
    let signals: string[] = [];

    for (const classification of CLASSIFICATIONS) {
      const matched = this.table[classification].keywords.filter((k) => containsPhrase(haystack, k));
      const score = matched.reduce((sum, k) => sum + k.split(/\s+/).length, 0);
      if (score > bestScore) {
        best = classification;
        bestScore = score;
        signals = matched;
      }
    }

    const category = this.table[best];
    const vars = { operation, timestamp };
    const render = (text: string) => renderTemplate(text, vars);

    return {
      classification: best,
      lowConfidence: bestScore === 0,
      matchedSignals: signals,
      rootCauses: category.rootCauses.map(render),
      impact: render(category.impact),
      resolutionSteps: category.resolutionSteps.map(render),
      prevention: category.prevention.map(render),
      stateSummary: summarizeState(event.systemState),
      operation,
      timestamp,
    };
  }
}

export function formatDiagnosticReport(report: DiagnosticReport): string {
  const list = (items: string[]) => items.map((item) => `  - ${item}`).join("\n");
  const confidence = report.lowConfidence ? " (low confidence)" : "";
  return [
    `Classification: ${report.classification}${confidence}`,
    `Operation: ${report.operation} at ${report.timestamp}`,
    report.matchedSignals.length ? `Signals: ${report.matchedSignals.join(", ")}` : "Signals: none",
    `State: ${report.stateSummary}`,
    `Impact: ${report.impact}`,
    `Root causes:\n${list(report.rootCauses)}`,
    `Resolution steps:\n${list(report.resolutionSteps)}`,
    `Prevention:\n${list(report.prevention)}`,
  ].join("\n");
}
