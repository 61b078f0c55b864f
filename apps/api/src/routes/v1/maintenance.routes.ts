/**
 * Maintenance Routes
 */
import type { FastifyPluginAsync } from 'fastify';
import { CleanupRequestSchema, type CleanupResponse } from '@tariffline/shared';
import type { FileSystemOutputStore } from '../../utils/output-store.js';

export interface MaintenanceRoutesOptions {
  store: FileSystemOutputStore;
  retentionDays: number;
}

export const maintenanceRoutes: FastifyPluginAsync<MaintenanceRoutesOptions> = async (
  fastify,
  { store, retentionDays }
) => {
  /**
   * POST /maintenance/cleanup
   * Remove generated exports older than `days` (default: configured retention)
   */
  fastify.post('/cleanup', async (request, reply) => {
    const { days = retentionDays } = CleanupRequestSchema.parse(request.body ?? {});
    const result = await store.cleanup(days);
    const sizeRemovedMb = Math.round((result.bytesRemoved / (1024 * 1024)) * 100) / 100;

    request.log.info({ days, ...result }, 'Output cleanup completed');

    const response: CleanupResponse = {
      success: true,
      filesRemoved: result.filesRemoved,
      sizeRemovedMb,
      message: `Removed ${result.filesRemoved} files older than ${days} days`,
    };
    return reply.send(response);
  });
};
