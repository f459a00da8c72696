export interface Fact {
  text: string; // complete sentence with an explicit subject
  temporalContext?: string; // date phrase embedded in text
  language: string; // "en" | "und"
  sourceExcerpt?: string;
  context?: string; // section / topic label
}

export interface InvalidFact {
  fact: Fact;
  reason: string;
}

export interface ValidationResult {
  valid: Fact[];
  invalid: InvalidFact[];
  suggestions: string[];
}

export type ValidationRule = "subject" | "specificity" | "consistency" | "temporal";

export type ValidationCriteria = Partial<Record<ValidationRule, boolean>>;

export type ValidationFormat = "sections" | "json";

export interface MemoryRecord extends Fact {
  id: string;
  userId: string;
  metadata: Record<string, string>;
  createdAt: string; // ISO 8601
}

export interface MemorySearchResult {
  record: MemoryRecord;
  score: number;
}

// ── Diagnostics ──────────────────────────────────────────

export type ErrorClassification = "connection" | "configuration" | "data" | "logic";

export interface ErrorEvent {
  errorMessage: string;
  systemState: unknown;
  operation: string;
  timestamp: string;
}

export interface DiagnosticReport {
  classification: ErrorClassification;
  lowConfidence: boolean;
  matchedSignals: string[];
  rootCauses: string[];
  impact: string;
  resolutionSteps: string[];
  prevention: string[];
  /** Compact rendering of the opaque system state. */
  stateSummary: string;
  operation: string;
  timestamp: string;
}

// ── Chat ─────────────────────────────────────────────────

export interface ChatContext {
  userId: string;
  facts: Fact[];
  query: string;
}

// ── Ingestion ────────────────────────────────────────────

export interface ExtractionInput {
  content: string;
  context: string;
  timeContext?: string;
}

export interface IngestResult {
  extracted: Fact[];
  validation: ValidationResult;
  stored: MemoryRecord[];
}

export interface IngestSummary {
  files: number;
  sections: number;
  extracted: number;
  stored: number;
  rejected: number;
  failures: { source: string; error: string }[];
}
