import { createLogger, type Logger } from '@pixhold/utils';

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
export const JPEG_SIGNATURE = Buffer.from([0xff, 0xd8, 0xff, 0xe0]);
export const GIF_SIGNATURE = Buffer.from('GIF89a', 'latin1');

function withHeader(header: Buffer, size: number, fill: number): Buffer {
  const buffer = Buffer.alloc(Math.max(size, header.length), fill);
  header.copy(buffer);
  return buffer;
}

export function pngBytes(size = 64): Buffer {
  return withHeader(PNG_SIGNATURE, size, 0x11);
}

export function jpegBytes(size = 64): Buffer {
  return withHeader(JPEG_SIGNATURE, size, 0x22);
}

export function gifBytes(size = 64): Buffer {
  return withHeader(GIF_SIGNATURE, size, 0x33);
}

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createLogger({
    level: 'debug',
    destination: {
      write(message: string) {
        lines.push(JSON.parse(message));
      }
    }
  });
  return { logger, lines };
}
