/**
 * @runwatch/core — Domain types
 *
 * Shared by the pipeline components, the HTTP API and the CLI.
 */

// ─── Log Lines ──────────────────────────────────────────────────────

/** A single ingested log line. Ephemeral: discarded after classification. */
export interface LogLine {
  text: string;
  /** ISO 8601, when the line carries a parseable leading timestamp */
  timestamp?: string;
  /** Index of the chunk this line arrived in */
  chunkIndex: number;
  /** Position of the line within the whole stream */
  lineIndex: number;
}

// ─── Rules ──────────────────────────────────────────────────────────

/** Suppresses routine log lines. Append-only; only hitCount ever changes. */
export interface FilterRule {
  id: string;
  pattern: string;
  description: string;
  createdAt: string;
  hitCount: number;
}

export type FailureSource = 'application_failure' | 'infrastructure_failure' | 'unknown';

export type Provenance = 'rule_based' | 'llm_generated';

/** The diagnosis fields a DiagnosisRule stamps onto every match */
export interface FailureTemplate {
  rootCause: string;
  errorType: string;
  source: FailureSource;
  isRecoverable: boolean;
  mitigation: string;
}

/** Matches a failure signature and classifies it instantly. */
export interface DiagnosisRule {
  id: string;
  pattern: string;
  template: FailureTemplate;
  createdAt: string;
  matchCount: number;
}

/** Structured diagnosis of one failure. */
export interface FailureRecord extends FailureTemplate {
  provenance: Provenance;
  /** Set exactly when provenance is 'rule_based' */
  originatingRuleId: string | null;
}

// ─── Recovery ───────────────────────────────────────────────────────

export type RecoveryKind = 'auto_recoverable' | 'manual_intervention';

export interface RecoveryAction {
  kind: RecoveryKind;
  description: string;
}

// ─── Filtering ──────────────────────────────────────────────────────

export interface SuppressedDecision {
  kind: 'suppressed';
  line: LogLine;
  /** null for blank lines, which are dropped without a rule */
  ruleId: string | null;
}

export interface EscalatedDecision {
  kind: 'escalated';
  line: LogLine;
  /** True when the line carries a failure signature and must be diagnosed */
  failureCandidate: boolean;
}

export type FilterDecision = SuppressedDecision | EscalatedDecision;

// ─── Retrieval ──────────────────────────────────────────────────────

export interface RetrievalMatch {
  id: string;
  text: string;
  record: FailureRecord;
  /** Cosine similarity to the query, -1..1 */
  score: number;
  /** Insertion order */
  seq: number;
}

// ─── Diagnosis outcome ──────────────────────────────────────────────

export type DiagnosisTier = 'rule' | 'reasoning' | 'fallback';

/** What the pipeline delivers for every detected failure. */
export interface DiagnosisOutcome {
  jobId: string;
  line: LogLine;
  record: FailureRecord;
  action: RecoveryAction;
  tier: DiagnosisTier;
  /** Id of the diagnosis rule learned from this failure, if one was stored */
  learnedRuleId: string | null;
  /** Number of past failures used as grounding (reasoning tier only) */
  retrievedCount: number;
}
