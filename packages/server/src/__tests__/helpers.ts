import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { FastifyInstance } from 'fastify';
import { IN_MEMORY, type ImageFileType } from '@pixhold/db';
import { LocalDeployment } from '@pixhold/deployment';
import { ConfigService, type AppConfig } from '@pixhold/services';
import { createLogger } from '@pixhold/utils';

import { createApp } from '../app.js';

export const TEST_MAX_FILE_SIZE = 64 * 1024;
export const BASE_TIME = Date.parse('2024-05-01T12:00:00.000Z');

const BOUNDARY = '----pixholdTestBoundary7MA4YWxk';

export interface FormPart {
  field: string;
  filename?: string;
  contentType?: string;
  content: Buffer | string;
}

/**
 * Encode parts as a multipart/form-data request body
 */
export function multipartBody(parts: FormPart[]): { payload: Buffer; headers: Record<string, string> } {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    let disposition = `form-data; name="${part.field}"`;
    if (part.filename !== undefined) {
      disposition += `; filename="${part.filename}"`;
    }
    let head = `--${BOUNDARY}\r\nContent-Disposition: ${disposition}\r\n`;
    if (part.contentType) {
      head += `Content-Type: ${part.contentType}\r\n`;
    }
    chunks.push(Buffer.from(`${head}\r\n`), Buffer.from(part.content), Buffer.from('\r\n'));
  }
  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));

  return {
    payload: Buffer.concat(chunks),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` }
  };
}

export function pngBytes(size = 64): Buffer {
  const buffer = Buffer.alloc(size, 0x5a);
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(buffer);
  return buffer;
}

export interface TestApp {
  app: FastifyInstance;
  deployment: LocalDeployment;
  config: AppConfig;
  /** Time handed to the next upload */
  setClock(time: number): void;
  close(): Promise<void>;
}

/**
 * App over a temp upload directory and an in-memory database. Uploads get
 * sequential names (file1.png, file2.jpg, ...).
 */
export async function createTestApp(overrides: Partial<AppConfig> = {}): Promise<TestApp> {
  const dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pixhold-server-'));
  const config = new ConfigService({
    dataDir,
    dbPath: IN_MEMORY,
    maxFileSize: TEST_MAX_FILE_SIZE,
    ...overrides
  }).assertValid();

  let clock = BASE_TIME;
  let counter = 0;
  const deployment = new LocalDeployment(config, createLogger({ level: 'silent' }), {
    imageService: {
      now: () => new Date(clock),
      generateFilename: (fileType: ImageFileType) => `file${++counter}.${fileType}`
    }
  });
  await deployment.initialize();

  const app = await createApp({ deployment, logRequests: false });
  await app.ready();

  return {
    app,
    deployment,
    config,
    setClock(time: number) {
      clock = time;
    },
    async close() {
      await app.close();
      await deployment.cleanup();
      await fs.rm(dataDir, { recursive: true, force: true });
    }
  };
}
