/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INVOICE PIPELINE SERVICE
 * detect → extract → normalize → [pair → combine] → summarize + export
 *
 * One call, one run: no state survives between calls.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
  EngineOptionsSchema,
  type EngineOptions,
  type EngineOptionsInput,
  type FilePair,
  type FormatKind,
  type InvoiceSummary,
  type LineItem,
  type PairingResult,
  type ProcessingWarning,
  type RawRow,
  type SourceTag,
  type UploadedFile,
} from '@tariffline/shared';
import { combineLineItems } from '../combine/combiner.js';
import { detectFormat } from '../detection/format-detector.js';
import { buildExportFilename, toCsv } from '../export/csv-exporter.js';
import { createExtractors, type ExtractorSet } from '../extraction/index.js';
import { pdfjsTextReader, type PdfTextReader } from '../extraction/pdf.extractor.js';
import { InputFormatError, type ExtractionResult } from '../extraction/types.js';
import { AliasResolver, defaultAliasResolver } from '../normalization/alias-resolver.js';
import { applyLineItemDefaults, normalizeRows } from '../normalization/normalizer.js';
import { createChildLogger, type Logger } from '../observability/logger.js';
import { resolvePairs as resolveFilePairs } from '../pairing/pairing-resolver.js';
import { aggregateBySku, summarizeLineItems } from '../summary/aggregator.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Where generated CSV files go; returns the stored path */
export interface OutputSink {
  write(filename: string, content: string): Promise<string>;
}

export interface InvoicePipelineDeps {
  sink: OutputSink;
  pdfReader?: PdfTextReader;
  aliases?: AliasResolver;
  logger?: Logger;
  clock?: () => Date;
}

export interface ProcessResult {
  lineItems: LineItem[];
  summary: InvoiceSummary;
  csvPath: string;
  skippedRowCount: number;
  warnings: ProcessingWarning[];
  /** Line items grouped by SKU */
  aggregated: LineItem[];
  aggregatedCsvPath: string;
  pairs: FilePair[];
  /** True when at least one pair was fused */
  combined: boolean;
}

export interface PreviewResult {
  format: FormatKind;
  columns: string[];
  sampleRows: RawRow[];
}

export type InvoiceProcessingErrorCode = 'NO_FILES' | 'NO_READABLE_FILES';

export class InvoiceProcessingError extends Error {
  constructor(
    public code: InvoiceProcessingErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'InvoiceProcessingError';
  }
}

type FileRole = 'pdf' | 'txt' | 'csv';

interface ClassifiedFile {
  file: UploadedFile;
  format: FormatKind;
  role: FileRole;
}

interface ClassifiedPair {
  pdf: ClassifiedFile;
  txt: ClassifiedFile;
  score: number;
}

interface ClassifiedPairing {
  pairs: ClassifiedPair[];
  unmatched: ClassifiedFile[];
}

/** Mutable state of one process() call */
interface RunState {
  warnings: ProcessingWarning[];
  skippedRowCount: number;
  readableFiles: number;
  inferredInvoice?: string;
}

const ROLE_BY_FORMAT: Record<FormatKind, FileRole> = {
  'pdf-text': 'pdf',
  csv: 'csv',
  'structured-text': 'txt',
  'unstructured-text': 'txt',
};

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════════════════════

export class InvoicePipelineService {
  readonly options: EngineOptions;
  private readonly extractors: ExtractorSet;
  private readonly aliases: AliasResolver;
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(
    private readonly deps: InvoicePipelineDeps,
    options: EngineOptionsInput = {}
  ) {
    this.options = EngineOptionsSchema.parse(options);
    this.extractors = createExtractors(deps.pdfReader ?? pdfjsTextReader);
    this.aliases = deps.aliases ?? defaultAliasResolver;
    this.log = deps.logger ?? createChildLogger({ component: 'invoice-pipeline' });
    this.clock = deps.clock ?? (() => new Date());
  }

  async process(files: readonly UploadedFile[], invoiceNumber?: string): Promise<ProcessResult> {
    if (files.length === 0) {
      throw new InvoiceProcessingError('NO_FILES', 'No files provided');
    }

    const filter = invoiceNumber?.trim() || undefined;
    const state: RunState = { warnings: [], skippedRowCount: 0, readableFiles: 0 };
    const classified = files.map((file) => this.classify(file));
    const pairing = this.pairClassified(classified);

    for (const file of pairing.unmatched) {
      if (file.role === 'pdf' && classified.some((entry) => entry.role === 'txt')) {
        state.warnings.push({
          code: 'PAIRING_UNMATCHED',
          filename: file.file.filename,
          message: 'No companion text file matched this PDF; processed on its own',
        });
      }
    }

    const lineItems: LineItem[] = [];
    let combined = false;

    for (const pair of pairing.pairs) {
      const pairLog = createChildLogger({ pair: `${pair.pdf.file.filename} + ${pair.txt.file.filename}` }, this.log);
      // defaults wait until the PDF has had a chance to fill the gaps
      const pdf = await this.load(pair.pdf, filter, state, true, pairLog);
      const txt = await this.load(pair.txt, filter, state, true, pairLog);
      const merged = combineLineItems(pdf ?? [], txt ?? []).map(applyLineItemDefaults);
      if (txt && txt.length > 0) combined = true;
      pairLog.info({ score: pair.score, rows: merged.length }, 'Pair combined');
      lineItems.push(...merged);
    }

    for (const entry of pairing.unmatched) {
      const items = await this.load(entry, filter, state);
      if (items) lineItems.push(...items);
    }

    if (state.readableFiles === 0) {
      throw new InvoiceProcessingError('NO_READABLE_FILES', 'None of the provided files could be read');
    }

    const now = this.clock();
    const invoiceLabel = filter ?? state.inferredInvoice ?? '';
    const summary = summarizeLineItems(lineItems, invoiceLabel, {
      topHtsLimit: this.options.topHtsLimit,
      now,
    });
    const aggregated = aggregateBySku(lineItems);

    const csvPath = await this.deps.sink.write(
      buildExportFilename(now, invoiceLabel, combined ? 'combined_processed' : 'processed'),
      toCsv(lineItems)
    );
    const aggregatedCsvPath = await this.deps.sink.write(
      buildExportFilename(now, invoiceLabel, 'aggregated'),
      toCsv(aggregated)
    );

    this.log.info(
      {
        files: files.length,
        pairs: pairing.pairs.length,
        lines: lineItems.length,
        skipped: state.skippedRowCount,
        warnings: state.warnings.length,
      },
      'Invoice processing completed'
    );

    return {
      lineItems,
      summary,
      csvPath,
      skippedRowCount: state.skippedRowCount,
      warnings: state.warnings,
      aggregated,
      aggregatedCsvPath,
      pairs: pairing.pairs.map((pair) => ({ pdf: pair.pdf.file, txt: pair.txt.file, score: pair.score })),
      combined,
    };
  }

  /** Detector + extractor only, first rows as the source wrote them */
  async preview(file: UploadedFile): Promise<PreviewResult> {
    const format = this.detect(file);
    let extraction: ExtractionResult;
    try {
      extraction = await this.extractors[format].extract(file);
    } catch (error) {
      if (error instanceof InputFormatError) {
        throw new InvoiceProcessingError('NO_READABLE_FILES', `${error.filename}: ${error.message}`);
      }
      throw error;
    }
    return {
      format,
      columns: extraction.columns,
      sampleRows: extraction.rows.slice(0, this.options.previewSampleSize),
    };
  }

  /** Pairs in resolution order; unmatched files keep their input order */
  resolvePairs(files: readonly UploadedFile[]): PairingResult {
    const pairing = this.pairClassified(files.map((file) => this.classify(file)));
    return {
      pairs: pairing.pairs.map((pair) => ({ pdf: pair.pdf.file, txt: pair.txt.file, score: pair.score })),
      unmatched: pairing.unmatched.map((entry) => entry.file),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════════════

  private detect(file: UploadedFile): FormatKind {
    return detectFormat(file, {
      structuredMinMatchingColumns: this.options.structuredMinMatchingColumns,
      sampleBytes: this.options.detectionSampleBytes,
      aliases: this.aliases,
    });
  }

  private classify(file: UploadedFile): ClassifiedFile {
    const format = this.detect(file);
    return { file, format, role: ROLE_BY_FORMAT[format] };
  }

  private pairClassified(classified: readonly ClassifiedFile[]): ClassifiedPairing {
    const resolved = resolveFilePairs(
      classified.filter((entry) => entry.role === 'pdf').map((entry) => ({ filename: entry.file.filename, entry })),
      classified.filter((entry) => entry.role === 'txt').map((entry) => ({ filename: entry.file.filename, entry })),
      this.options.pairingSimilarityThreshold
    );
    const paired = new Set<ClassifiedFile>();
    const pairs = resolved.pairs.map((pair): ClassifiedPair => {
      paired.add(pair.pdf.entry);
      paired.add(pair.txt.entry);
      return { pdf: pair.pdf.entry, txt: pair.txt.entry, score: pair.score };
    });
    return { pairs, unmatched: classified.filter((entry) => !paired.has(entry)) };
  }

  /** Extract and normalize one file; null when it cannot be read at all */
  private async load(
    entry: ClassifiedFile,
    filter: string | undefined,
    state: RunState,
    deferDefaults = false,
    parent: Logger = this.log
  ): Promise<LineItem[] | null> {
    const { file, format, role } = entry;
    const log = createChildLogger({ filename: file.filename, format }, parent);

    let extraction: ExtractionResult;
    try {
      extraction = await this.extractors[format].extract(file);
    } catch (error) {
      if (error instanceof InputFormatError) {
        log.warn({ err: error }, 'Unreadable input skipped');
        state.warnings.push({ code: 'INPUT_FORMAT', filename: file.filename, message: error.message });
        return null;
      }
      throw error;
    }
    state.readableFiles++;
    state.warnings.push(...extraction.warnings);

    const sourceTag: SourceTag = role;
    const normalized = normalizeRows(extraction.rows, sourceTag, {
      invoiceNumber: filter,
      aliases: this.aliases,
      deferDefaults,
    });

    const skippedRows = extraction.skippedRows + normalized.skippedRows;
    if (skippedRows > 0) {
      state.skippedRowCount += skippedRows;
      state.warnings.push({
        code: 'ROWS_SKIPPED',
        filename: file.filename,
        count: skippedRows,
        message: `${skippedRows} row(s) skipped`,
      });
    }

    if (!state.inferredInvoice) {
      state.inferredInvoice = normalized.items.find((item) => item.invoiceNumber)?.invoiceNumber;
    }

    log.debug(
      {
        rows: extraction.rows.length,
        items: normalized.items.length,
        skipped: skippedRows,
        filtered: normalized.filteredRows,
      },
      'File normalized'
    );

    return normalized.items;
  }
}
