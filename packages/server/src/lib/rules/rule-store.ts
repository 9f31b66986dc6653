/**
 * Rule Store — the persisted filter and diagnosis rule collections.
 *
 * Two JSON files under the rules directory. Append-only with dedup on the
 * normalized pattern; saves replace each file atomically (temp file + rename).
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { ulid } from 'ulid';
import { z } from 'zod';
import {
  DIAGNOSIS_RULES_FILE,
  FILTER_RULES_FILE,
  PersistenceError,
  compilePattern,
  diagnosisRuleEntrySchema,
  filterRuleEntrySchema,
  getErrorMessage,
  normalizePattern,
  tryCompilePattern,
  type DiagnosisRule,
  type DiagnosisRuleEntry,
  type FailureSource,
  type FailureTemplate,
  type FilterRule,
  type FilterRuleEntry,
} from '@runwatch/core';
import { createLogger } from '../logger.js';

const log = createLogger('RuleStore');

export interface LoadedRules {
  filterRules: FilterRule[];
  diagnosisRules: DiagnosisRule[];
}

export interface AppendResult<T> {
  /** False when a rule with the same pattern already existed */
  added: boolean;
  /** The stored rule: the new one, or the existing one with the same pattern */
  rule: T;
}

/** Build a new filter rule with a fresh id */
export function createFilterRule(pattern: string, description = ''): FilterRule {
  return {
    id: ulid(),
    pattern: normalizePattern(pattern),
    description,
    createdAt: new Date().toISOString(),
    hitCount: 0,
  };
}

/** Build a new diagnosis rule with a fresh id */
export function createDiagnosisRule(pattern: string, template: FailureTemplate): DiagnosisRule {
  return {
    id: ulid(),
    pattern: normalizePattern(pattern),
    template: { ...template },
    createdAt: new Date().toISOString(),
    matchCount: 0,
  };
}

function migrateFilterEntry(entry: FilterRuleEntry): FilterRule {
  return typeof entry === 'string' ? createFilterRule(entry) : entry;
}

function migrateSource(source: FailureSource | 'user_mistake'): FailureSource {
  return source === 'user_mistake' ? 'application_failure' : source;
}

function migrateDiagnosisEntry(entry: DiagnosisRuleEntry): DiagnosisRule {
  if ('id' in entry) return entry;
  const d = entry.diagnosis;
  return createDiagnosisRule(entry.regex, {
    rootCause: d.root_cause,
    errorType: d.error_type,
    source: migrateSource(d.source),
    isRecoverable: d.is_recoverable,
    mitigation: d.mitigation,
  });
}

export class RuleStore {
  private filters: FilterRule[] = [];
  private diagnoses: DiagnosisRule[] = [];

  constructor(readonly rulesDir: string) {}

  get filterRulesPath(): string {
    return join(this.rulesDir, FILTER_RULES_FILE);
  }

  get diagnosisRulesPath(): string {
    return join(this.rulesDir, DIAGNOSIS_RULES_FILE);
  }

  /** Filter rules in insertion order */
  get filterRules(): readonly FilterRule[] {
    return this.filters;
  }

  /** Diagnosis rules in insertion order */
  get diagnosisRules(): readonly DiagnosisRule[] {
    return this.diagnoses;
  }

  findDiagnosisRule(id: string): DiagnosisRule | undefined {
    return this.diagnoses.find((r) => r.id === id);
  }

  /**
   * Read both collections from disk, replacing what is in memory.
   * A missing store loads as empty; a corrupt file is moved aside. Never throws.
   */
  load(): LoadedRules {
    this.filters = dedupe(
      this.readCollection(this.filterRulesPath, filterRuleEntrySchema).map(migrateFilterEntry),
      this.filterRulesPath,
    );
    this.diagnoses = dedupe(
      this.readCollection(this.diagnosisRulesPath, diagnosisRuleEntrySchema).map(migrateDiagnosisEntry),
      this.diagnosisRulesPath,
    );
    log.info('Rules loaded', { filterRules: this.filters.length, diagnosisRules: this.diagnoses.length });
    return { filterRules: [...this.filters], diagnosisRules: [...this.diagnoses] };
  }

  /**
   * Append a filter rule unless one with the same pattern exists.
   * @throws RuleCompilationError if the pattern does not compile
   */
  appendFilterRule(rule: FilterRule): AppendResult<FilterRule> {
    return appendUnique(this.filters, rule);
  }

  /**
   * Append a diagnosis rule unless one with the same pattern exists.
   * @throws RuleCompilationError if the pattern does not compile
   */
  appendDiagnosisRule(rule: DiagnosisRule): AppendResult<DiagnosisRule> {
    return appendUnique(this.diagnoses, rule);
  }

  /**
   * Flush both collections to disk.
   * @throws PersistenceError on any I/O failure
   */
  save(): void {
    try {
      mkdirSync(this.rulesDir, { recursive: true });
    } catch (err: unknown) {
      throw new PersistenceError(`Cannot create rules directory ${this.rulesDir}: ${getErrorMessage(err)}`, err);
    }
    writeAtomic(this.filterRulesPath, this.filters);
    writeAtomic(this.diagnosisRulesPath, this.diagnoses);
  }

  /** Clear both collections and delete their files. */
  reset(): void {
    this.filters = [];
    this.diagnoses = [];
    for (const path of [this.filterRulesPath, this.diagnosisRulesPath]) {
      try {
        rmSync(path, { force: true });
      } catch (err: unknown) {
        throw new PersistenceError(`Cannot delete ${path}: ${getErrorMessage(err)}`, err);
      }
    }
    log.info('Rules reset', { rulesDir: this.rulesDir });
  }

  private readCollection<T>(path: string, entrySchema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
    if (!existsSync(path)) return [];

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err: unknown) {
      this.quarantine(path, getErrorMessage(err));
      return [];
    }

    if (!Array.isArray(raw)) {
      this.quarantine(path, 'expected a JSON array');
      return [];
    }

    const entries: T[] = [];
    raw.forEach((item: unknown, index) => {
      const parsed = entrySchema.safeParse(item);
      if (parsed.success) entries.push(parsed.data);
      else log.warn('Dropping invalid rule entry', { path, index, issues: parsed.error.issues.length });
    });
    return entries;
  }

  private quarantine(path: string, reason: string): void {
    const aside = `${path}.corrupt-${Date.now()}`;
    try {
      renameSync(path, aside);
      log.error('Corrupt rule file moved aside', { path, movedTo: aside, reason });
    } catch (err: unknown) {
      log.error('Corrupt rule file could not be moved aside', { path, reason, error: getErrorMessage(err) });
    }
  }
}

function appendUnique<T extends { pattern: string }>(rules: T[], rule: T): AppendResult<T> {
  const pattern = normalizePattern(rule.pattern);
  compilePattern(pattern);
  const existing = rules.find((r) => normalizePattern(r.pattern) === pattern);
  if (existing) return { added: false, rule: existing };
  const stored = { ...rule, pattern };
  rules.push(stored);
  return { added: true, rule: stored };
}

function dedupe<T extends { pattern: string }>(rules: T[], path: string): T[] {
  const seen = new Set<string>();
  const kept: T[] = [];
  for (const rule of rules) {
    const pattern = normalizePattern(rule.pattern);
    if (tryCompilePattern(pattern) === null) {
      log.warn('Dropping rule with invalid pattern', { path, pattern });
      continue;
    }
    if (seen.has(pattern)) continue;
    seen.add(pattern);
    kept.push({ ...rule, pattern });
  }
  return kept;
}

function writeAtomic(path: string, data: unknown): void {
  const tmp = `${path}.${process.pid}.${Date.now()}.tmp`;
  try {
    writeFileSync(tmp, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    renameSync(tmp, path);
  } catch (err: unknown) {
    rmSync(tmp, { force: true });
    throw new PersistenceError(`Cannot write ${path}: ${getErrorMessage(err)}`, err);
  }
}
