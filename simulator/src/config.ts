/**
 * Simulator configuration.
 *
 * Collector scheduling is a modeling choice, not a documented guarantee,
 * so every threshold here is configurable. Values come from a JSON file or
 * an object and are validated against SimulatorConfigSchema.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_GC_THRESHOLD, DEFAULT_GROWTH_FACTOR } from './store';

export const SimulatorConfigSchema = z
  .object({
    /** Soft ceiling in bytes; crossing it triggers a collection first. */
    gcThreshold: z.number().int().positive().default(DEFAULT_GC_THRESHOLD),
    /** How far the soft ceiling grows when a collection frees too little. */
    growthFactor: z.number().min(1).default(DEFAULT_GROWTH_FACTOR),
    /** Hard limit in bytes; null for unbounded. */
    memoryLimit: z.number().int().positive().nullable().default(null),
    /** Log one line per collection. */
    gcVerbose: z.boolean().default(false),
  })
  .strict();

export type SimulatorConfig = z.infer<typeof SimulatorConfigSchema>;

export const DEFAULT_CONFIG: SimulatorConfig = SimulatorConfigSchema.parse({});

/** Validate `input`, filling defaults. Throws ConfigError listing every issue. */
export function parseConfig(input: unknown): SimulatorConfig {
  const result = SimulatorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

/** Read and validate a JSON configuration file. */
export function loadConfig(file: string): SimulatorConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigError([`${file}: ${reason}`]);
  }
  return parseConfig(raw);
}
