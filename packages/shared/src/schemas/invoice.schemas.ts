/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INVOICE PROCESSING SCHEMAS
 * Zod schemas for engine options, line items and request inputs
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE OPTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Defaults for the tunable heuristics of the engine */
export const ENGINE_DEFAULTS = {
  /** Header tokens that must resolve to canonical fields before a .txt counts as structured */
  STRUCTURED_MIN_MATCHING_COLUMNS: 3,
  /** Minimum filename similarity for a PDF↔TXT pair */
  PAIRING_SIMILARITY_THRESHOLD: 0.6,
  /** Entries kept in InvoiceSummary.topHtsCodes */
  TOP_HTS_LIMIT: 10,
  /** Raw rows returned by preview */
  PREVIEW_SAMPLE_SIZE: 5,
  /** Bytes inspected by the format detector */
  DETECTION_SAMPLE_BYTES: 64 * 1024,
} as const;

export const EngineOptionsSchema = z.object({
  structuredMinMatchingColumns: z
    .number()
    .int()
    .min(1)
    .default(ENGINE_DEFAULTS.STRUCTURED_MIN_MATCHING_COLUMNS),
  pairingSimilarityThreshold: z
    .number()
    .min(0)
    .max(1)
    .default(ENGINE_DEFAULTS.PAIRING_SIMILARITY_THRESHOLD),
  topHtsLimit: z.number().int().positive().default(ENGINE_DEFAULTS.TOP_HTS_LIMIT),
  previewSampleSize: z.number().int().positive().default(ENGINE_DEFAULTS.PREVIEW_SAMPLE_SIZE),
  detectionSampleBytes: z.number().int().positive().default(ENGINE_DEFAULTS.DETECTION_SAMPLE_BYTES),
});

export type EngineOptionsInput = z.input<typeof EngineOptionsSchema>;
export type EngineOptions = z.output<typeof EngineOptionsSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST INPUTS
// ═══════════════════════════════════════════════════════════════════════════════

/** Optional invoice number filter; blank means "no filter" */
export const InvoiceNumberFilterSchema = z
  .string()
  .trim()
  .max(64)
  .optional()
  .transform((value) => (value ? value : undefined));

export const CleanupRequestSchema = z
  .object({
    /** Remove generated files older than this many days */
    days: z.coerce.number().int().min(0).max(3650).optional(),
  })
  .default({});

/** Generated export filenames only: no separators, no traversal */
export const ExportFilenameSchema = z
  .string()
  .min(1)
  .max(200)
  .regex(/^[A-Za-z0-9._-]+\.csv$/, 'Invalid export filename')
  .refine((name) => !name.includes('..'), { message: 'Invalid export filename' });
