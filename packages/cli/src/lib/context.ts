/**
 * What a command needs from its environment. Tests pass both fields;
 * the binary leaves them unset and reads the process environment.
 */

import { getConfig, type PipelineOverrides, type RunwatchConfig } from '@runwatch/server';

export interface CommandContext {
  config?: RunwatchConfig;
  overrides?: PipelineOverrides;
}

export function resolveConfig(ctx: CommandContext): RunwatchConfig {
  return ctx.config ?? getConfig();
}

/** Parse a positive integer option, or report it and return null */
export function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number | null {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    console.error(`--${name} must be a positive integer, got: ${raw}`);
    return null;
  }
  return value;
}
