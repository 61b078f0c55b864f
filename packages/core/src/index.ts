/**
 * @tariffline/core
 * Extraction, normalization and combination engine for invoice line items
 */

// Pipeline
export { InvoicePipelineService, InvoiceProcessingError } from './pipeline/invoice-pipeline.service.js';
export type {
  InvoicePipelineDeps,
  InvoiceProcessingErrorCode,
  OutputSink,
  PreviewResult,
  ProcessResult,
} from './pipeline/invoice-pipeline.service.js';

// Detection
export { detectFormat, detectStructuredLayout, fileExtension } from './detection/format-detector.js';
export type { DetectionInput, DetectionOptions, StructuredLayout } from './detection/format-detector.js';

// Extraction
export * from './extraction/index.js';

// Normalization
export { AliasResolver, defaultAliasResolver } from './normalization/alias-resolver.js';
export type { ResolvedAlias } from './normalization/alias-resolver.js';
export {
  applyLineItemDefaults,
  createLineItem,
  matchesInvoiceNumber,
  normalizeRow,
  normalizeRows,
} from './normalization/normalizer.js';
export type { LineItemInput, NormalizationResult, NormalizeOptions } from './normalization/normalizer.js';
export { parseDecimal, parseNonNegative, roundMoney, roundTo } from './normalization/numbers.js';

// Pairing & combination
export {
  filenameSimilarity,
  longestCommonSubstring,
  normalizeStem,
  resolvePairs,
} from './pairing/pairing-resolver.js';
export { combineLineItems, identitiesCompatible } from './combine/combiner.js';

// Summary & export
export { aggregateBySku, summarizeLineItems } from './summary/aggregator.js';
export type { SummaryOptions } from './summary/aggregator.js';
export { buildExportFilename, formatTimestamp, invoiceFileToken, toCsv } from './export/csv-exporter.js';
export type { ExportKind } from './export/csv-exporter.js';

// Observability
export { logger, createChildLogger } from './observability/logger.js';
export type { Logger, LogContext } from './observability/logger.js';
