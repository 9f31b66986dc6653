/**
 * @runwatch/core — Zod Validation Schemas
 *
 * Runtime validation for persisted rules and for structured model output.
 */
import { z } from 'zod';

export const failureSourceSchema = z.enum(['application_failure', 'infrastructure_failure', 'unknown']);

export const provenanceSchema = z.enum(['rule_based', 'llm_generated']);

export const failureTemplateSchema = z.object({
  rootCause: z.string(),
  errorType: z.string().min(1),
  source: failureSourceSchema,
  isRecoverable: z.boolean(),
  mitigation: z.string(),
});

export const failureRecordSchema = failureTemplateSchema
  .extend({
    provenance: provenanceSchema,
    originatingRuleId: z.string().nullable(),
  })
  .refine((r) => (r.provenance === 'rule_based') === (r.originatingRuleId !== null), {
    message: 'originatingRuleId must be set exactly for rule_based records',
  });

// ─── Persisted rules ────────────────────────────────────────────────

export const filterRuleSchema = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
  description: z.string().default(''),
  createdAt: z.string(),
  hitCount: z.number().int().nonnegative().default(0),
});

export const diagnosisRuleSchema = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
  template: failureTemplateSchema,
  createdAt: z.string(),
  matchCount: z.number().int().nonnegative().default(0),
});

/** Older rule files stored filters as bare regex strings */
export const legacyFilterRuleSchema = z.string().min(1);

/** Older rule files stored { regex, diagnosis } with snake_case fields */
export const legacyDiagnosisRuleSchema = z.object({
  regex: z.string().min(1),
  diagnosis: z.object({
    root_cause: z.string(),
    error_type: z.string().min(1),
    source: z.enum(['user_mistake', 'application_failure', 'infrastructure_failure', 'unknown']),
    is_recoverable: z.boolean(),
    mitigation: z.string(),
  }),
});

export const filterRuleEntrySchema = z.union([filterRuleSchema, legacyFilterRuleSchema]);
export const diagnosisRuleEntrySchema = z.union([diagnosisRuleSchema, legacyDiagnosisRuleSchema]);

export type FilterRuleEntry = z.infer<typeof filterRuleEntrySchema>;
export type DiagnosisRuleEntry = z.infer<typeof diagnosisRuleEntrySchema>;

// ─── Structured model output ────────────────────────────────────────

/** Response of the failure reasoning agent */
export const diagnosisResponseSchema = z.object({
  root_cause: z.string().min(1),
  error_type: z.string().min(1),
  source: failureSourceSchema,
  is_recoverable: z.boolean(),
  mitigation: z.string().min(1),
  new_rule_regex: z.string().nullable(),
});

export type DiagnosisResponse = z.infer<typeof diagnosisResponseSchema>;

/** Response of the log pattern agent */
export const logPatternResponseSchema = z.object({
  is_pattern: z.boolean(),
  regex: z.string().nullable(),
  description: z.string(),
});

export type LogPatternResponse = z.infer<typeof logPatternResponseSchema>;

// ─── API input ──────────────────────────────────────────────────────

export const diagnoseRequestSchema = z.object({
  line: z.string().min(1).max(65_536),
  jobId: z.string().min(1).max(128).optional(),
});

export type DiagnoseRequest = z.infer<typeof diagnoseRequestSchema>;
