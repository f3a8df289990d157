/**
 * Zod schema for pattern table validation.
 */
import { z } from 'zod';

/**
 * Schema for a single pattern entry.
 */
export const PatternEntrySchema = z.object({
  /** Coordinate text, e.g. L1.Q1.TECH.PYTHON.FUNCTION.BASIC[C3] */
  coordinate: z.string().min(1),
  title: z.string().min(1),
  language: z.string().min(1),
  /** Keywords for matching; normalized to lower case on load */
  tags: z.array(z.string().min(1)).default([]),
  /** Template text */
  body: z.string().min(1),
  /** Test template rendered next to the body */
  tests: z.string().optional(),
  description: z.string().optional(),
  dependencies: z.array(z.string().min(1)).default([]),
});

/**
 * Schema for a pattern table file.
 */
export const PatternTableSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String),
  /** Main lexicon of the table, informational */
  lexicon: z.string().optional(),
  patterns: z.array(PatternEntrySchema).default([]),
});

export type PatternEntry = z.infer<typeof PatternEntrySchema>;
export type PatternTableDocument = z.infer<typeof PatternTableSchema>;
