import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { AppConfig } from '../../src/config.js';

const BOUNDARY = '----tariffline-test-boundary';

export interface MultipartPart {
  name: string;
  content: string | Uint8Array;
  filename?: string;
  contentType?: string;
}

export function multipartBody(parts: MultipartPart[]): { payload: Buffer; headers: Record<string, string> } {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    let head = `--${BOUNDARY}\r\nContent-Disposition: form-data; name="${part.name}"`;
    if (part.filename !== undefined) {
      head += `; filename="${part.filename}"\r\nContent-Type: ${part.contentType ?? 'application/octet-stream'}`;
    }
    chunks.push(Buffer.from(`${head}\r\n\r\n`));
    chunks.push(typeof part.content === 'string' ? Buffer.from(part.content) : Buffer.from(part.content));
    chunks.push(Buffer.from('\r\n'));
  }
  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));
  return {
    payload: Buffer.concat(chunks),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  };
}

export async function createTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'tariffline-'));
}

export async function removeDir(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
}

export function testConfig(outputDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    nodeEnv: 'test',
    logLevel: 'silent',
    port: 0,
    host: '127.0.0.1',
    outputDir,
    maxUploadBytes: 1024 * 1024,
    corsOrigin: true,
    retentionDays: 7,
    engine: {},
    ...overrides,
  };
}

export const TXT_CONTENT =
  [
    'PART\tPART_DESC\tHTTS\tC/N\tquantity\tAMT\tWEIGHT\tinvoice_nbr',
    'SKU1\tWidget\t8471.30\tCN\t10\t2.50\t5.0\tINV-100',
    'SKU2\tGadget\t8517.62\tMX\t4\t1.25\t2.0\tINV-100',
  ].join('\n') + '\n';
