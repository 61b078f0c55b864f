/**
 * Fastify application factory
 */
import { randomUUID } from 'crypto';
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
import { InvoicePipelineService, type PdfTextReader } from '@tariffline/core';
import type { AppConfig } from './config.js';
import { errorPlugin } from './plugins/error.plugin.js';
import { healthRoutes } from './routes/v1/health.routes.js';
import { invoiceRoutes } from './routes/v1/invoices.routes.js';
import { maintenanceRoutes } from './routes/v1/maintenance.routes.js';
import { FileSystemOutputStore } from './utils/output-store.js';

export interface AppDependencies {
  store?: FileSystemOutputStore;
  pdfReader?: PdfTextReader;
}

export async function buildApp(config: AppConfig, deps: AppDependencies = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: config.logLevel,
      transport:
        config.nodeEnv === 'development'
          ? { target: 'pino-pretty', options: { colorize: true } }
          : undefined,
    },
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
  });

  // Security plugins
  await app.register(helmet, {
    contentSecurityPolicy: config.nodeEnv === 'production',
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  await app.register(cors, {
    origin: config.corsOrigin,
    credentials: true,
  });

  // Multipart for invoice uploads
  await app.register(multipart, {
    limits: {
      fileSize: config.maxUploadBytes,
    },
  });

  await app.register(errorPlugin);

  const store = deps.store ?? new FileSystemOutputStore(config.outputDir);
  await store.ensureDirectory();

  const pipeline = new InvoicePipelineService(
    { sink: store, pdfReader: deps.pdfReader },
    config.engine
  );

  // Health routes
  await app.register(healthRoutes, { prefix: '/health', store });

  // API routes
  await app.register(invoiceRoutes, { prefix: '/api/v1/invoices', pipeline, store });
  await app.register(maintenanceRoutes, {
    prefix: '/api/v1/maintenance',
    store,
    retentionDays: config.retentionDays,
  });

  return app;
}
