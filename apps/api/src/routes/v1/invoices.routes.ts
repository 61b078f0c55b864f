/**
 * Invoice Routes
 * Upload, preview, pairing and download of processed invoice line items
 */
import { createReadStream } from 'fs';
import path from 'path';
import type { FastifyPluginAsync } from 'fastify';
import type { InvoicePipelineService } from '@tariffline/core';
import {
  API_ERROR_CODES,
  ExportFilenameSchema,
  InvoiceNumberFilterSchema,
  type ErrorResponse,
  type PreviewResponse,
  type ProcessResponse,
  type ResolvePairsResponse,
} from '@tariffline/shared';
import { collectUpload } from '../../utils/multipart.js';
import type { FileSystemOutputStore } from '../../utils/output-store.js';

const RAW_DATA_SAMPLE = 100;

export interface InvoiceRoutesOptions {
  pipeline: InvoicePipelineService;
  store: FileSystemOutputStore;
}

function noFiles(message: string): ErrorResponse {
  return { error: API_ERROR_CODES.NO_FILES, message };
}

export const invoiceRoutes: FastifyPluginAsync<InvoiceRoutesOptions> = async (fastify, { pipeline, store }) => {
  /**
   * POST /invoices/process
   * multipart: files (1..n), invoice_number (optional)
   */
  fastify.post('/process', async (request, reply) => {
    const { files, fields } = await collectUpload(request, 'files');
    if (files.length === 0) {
      return reply.code(400).send(noFiles('No files uploaded'));
    }

    const invoiceNumber = InvoiceNumberFilterSchema.parse(fields.invoice_number);
    const result = await pipeline.process(files, invoiceNumber);

    request.log.info(
      { files: files.length, lines: result.lineItems.length, combined: result.combined },
      'Invoice files processed'
    );

    const response: ProcessResponse = {
      success: true,
      summary: result.summary,
      rawData: {
        totalRows: result.lineItems.length,
        sample: result.lineItems.slice(0, RAW_DATA_SAMPLE),
      },
      aggregatedData: {
        totalRows: result.aggregated.length,
        sample: result.aggregated.slice(0, RAW_DATA_SAMPLE),
      },
      skippedRowCount: result.skippedRowCount,
      warnings: result.warnings,
      pairs: result.pairs.map((pair) => ({ pdf: pair.pdf.filename, txt: pair.txt.filename, score: pair.score })),
      downloadFilename: path.basename(result.csvPath),
      aggregatedFilename: path.basename(result.aggregatedCsvPath),
      message: result.combined
        ? `Processed ${result.lineItems.length} line items from ${files.length} files (combined)`
        : `Processed ${result.lineItems.length} line items from ${files.length} files`,
    };
    return reply.send(response);
  });

  /**
   * POST /invoices/preview
   * multipart: file
   */
  fastify.post('/preview', async (request, reply) => {
    const { files } = await collectUpload(request, 'file');
    const [file] = files;
    if (!file) {
      return reply.code(400).send(noFiles('No file uploaded'));
    }

    const preview = await pipeline.preview(file);
    const response: PreviewResponse = { filename: file.filename, ...preview };
    return reply.send(response);
  });

  /**
   * POST /invoices/resolve-pairs
   * multipart: files
   */
  fastify.post('/resolve-pairs', async (request, reply) => {
    const { files } = await collectUpload(request, 'files');
    if (files.length === 0) {
      return reply.code(400).send(noFiles('No files uploaded'));
    }

    const result = pipeline.resolvePairs(files);
    const response: ResolvePairsResponse = {
      pairs: result.pairs.map((pair) => ({ pdf: pair.pdf.filename, txt: pair.txt.filename, score: pair.score })),
      unmatched: result.unmatched.map((file) => file.filename),
    };
    return reply.send(response);
  });

  /**
   * GET /invoices/download/:filename
   */
  fastify.get<{ Params: { filename: string } }>('/download/:filename', async (request, reply) => {
    const filename = ExportFilenameSchema.parse(request.params.filename);
    const target = store.resolve(filename);
    if (!target || !(await store.exists(filename))) {
      const body: ErrorResponse = { error: API_ERROR_CODES.NOT_FOUND, message: 'File not found' };
      return reply.code(404).send(body);
    }

    return reply
      .header('Content-Disposition', `attachment; filename="${filename}"`)
      .type('text/csv; charset=utf-8')
      .send(createReadStream(target));
  });
};
