/**
 * @runwatch/core — Rule pattern utilities
 *
 * Rule patterns are stored as plain regex source strings. Models (and rule
 * files written by older tooling) often emit PCRE-style named groups and
 * inline flags, so patterns are translated to JavaScript before compiling:
 *
 *   (?P<name>...)   → (?<name>...)
 *   (?P=name)       → \k<name>
 *   leading (?ims)  → RegExp flags
 */

import { RuleCompilationError } from './errors.js';

/** Patterns are compared for dedup after normalization. */
export function normalizePattern(pattern: string): string {
  return pattern.trim();
}

export interface TranslatedPattern {
  source: string;
  flags: string;
}

const INLINE_FLAGS = /^\(\?([ims]+)\)/;

export function translatePattern(pattern: string): TranslatedPattern {
  let source = normalizePattern(pattern);
  let flags = '';

  const inline = INLINE_FLAGS.exec(source);
  if (inline) {
    flags = [...new Set(inline[1]!.split(''))].join('');
    source = source.slice(inline[0].length);
  }

  source = source.replace(/\(\?P</g, '(?<').replace(/\(\?P=(\w+)\)/g, '\\k<$1>');
  return { source, flags };
}

/**
 * Compile a stored rule pattern.
 *
 * @param extraFlags - flags merged with any inline flags from the pattern
 * @throws RuleCompilationError if the pattern is empty or invalid
 */
export function compilePattern(pattern: string, extraFlags = ''): RegExp {
  const { source, flags } = translatePattern(pattern);
  if (source.length === 0) {
    throw new RuleCompilationError(pattern, 'pattern is empty');
  }
  const merged = [...new Set((flags + extraFlags).split(''))].join('');
  try {
    return new RegExp(source, merged);
  } catch (err: unknown) {
    throw new RuleCompilationError(pattern, err instanceof Error ? err.message : String(err));
  }
}

/** Compile without throwing. Returns null for invalid patterns. */
export function tryCompilePattern(pattern: string, extraFlags = ''): RegExp | null {
  try {
    return compilePattern(pattern, extraFlags);
  } catch {
    return null;
  }
}

// ─── Timestamps ─────────────────────────────────────────────────────

const ISO_PREFIX =
  /^\[?(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}:\d{2}(?:[.,]\d{1,6})?)(Z|[+-]\d{2}:?\d{2})?\]?/;
const EPOCH_PREFIX = /^\[?(\d{10}(?:\.\d+)?|\d{13})\]?(?=\s|$)/;

/**
 * Extract a leading timestamp from a log line as ISO 8601.
 * Lines without a zone designator are read as UTC.
 */
export function parseLeadingTimestamp(text: string): string | undefined {
  const trimmed = text.trimStart();

  const iso = ISO_PREFIX.exec(trimmed);
  if (iso) {
    const time = iso[2]!.replace(',', '.');
    let zone = iso[3] ?? 'Z';
    if (/^[+-]\d{4}$/.test(zone)) zone = `${zone.slice(0, 3)}:${zone.slice(3)}`;
    const date = new Date(`${iso[1]}T${time}${zone}`);
    return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
  }

  const epoch = EPOCH_PREFIX.exec(trimmed);
  if (epoch) {
    const raw = epoch[1]!;
    const ms = raw.length === 13 && !raw.includes('.') ? Number(raw) : Number(raw) * 1000;
    const date = new Date(ms);
    return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
  }

  return undefined;
}
