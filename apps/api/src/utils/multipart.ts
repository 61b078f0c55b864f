/**
 * Multipart upload collection
 * Buffers every uploaded file of a request, keeping text fields aside.
 */
import type { FastifyRequest } from 'fastify';
import type { UploadedFile } from '@tariffline/shared';

export interface CollectedUpload {
  files: UploadedFile[];
  fields: Record<string, string>;
}

export async function collectUpload(request: FastifyRequest, fileField?: string): Promise<CollectedUpload> {
  const files: UploadedFile[] = [];
  const fields: Record<string, string> = {};

  for await (const part of request.parts()) {
    if (part.type === 'file') {
      const content = await part.toBuffer();
      if (fileField && part.fieldname !== fileField) continue;
      // browsers send an empty part when no file was picked
      if (!part.filename && content.length === 0) continue;
      files.push({
        filename: part.filename,
        content: new Uint8Array(content),
        declaredType: part.mimetype || null,
      });
    } else if (typeof part.value === 'string' && !(part.fieldname in fields)) {
      fields[part.fieldname] = part.value;
    }
  }

  return { files, fields };
}
