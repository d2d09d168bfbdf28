/**
 * Upload validation
 *
 * Decides accept/reject before any storage I/O. Pure: no side effects.
 */

import type { ImageFileType } from '@pixhold/db';

export type SniffedType = ImageFileType | 'unknown';

export type ValidationFailureKind = 'TooLarge' | 'UnsupportedType' | 'TypeMismatch';

export interface UploadCandidate {
  /** Client-declared filename */
  filename: string;
  /** Client-declared content type, if any */
  contentType?: string;
  size: number;
  /** Leading bytes of the content; the whole buffer is fine */
  head: Uint8Array;
}

export interface ValidationPolicy {
  maxFileSize: number;
}

export type ValidationResult =
  | { ok: true; fileType: ImageFileType }
  | { ok: false; kind: ValidationFailureKind; message: string };

const EXTENSION_TYPES: Record<string, ImageFileType> = {
  jpg: 'jpg',
  jpeg: 'jpg',
  png: 'png',
  gif: 'gif'
};

const MIME_TYPES: Record<string, ImageFileType> = {
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/pjpeg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif'
};

export const ALLOWED_EXTENSIONS = Object.keys(EXTENSION_TYPES);

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];
const GIF87A = [0x47, 0x49, 0x46, 0x38, 0x37, 0x61];
const GIF89A = [0x47, 0x49, 0x46, 0x38, 0x39, 0x61];

function startsWith(bytes: Uint8Array, signature: readonly number[]): boolean {
  if (bytes.length < signature.length) {
    return false;
  }
  return signature.every((byte, i) => bytes[i] === byte);
}

/**
 * Classify content by its magic bytes
 */
export function sniffImageType(head: Uint8Array): SniffedType {
  if (startsWith(head, JPEG_SIGNATURE)) return 'jpg';
  if (startsWith(head, PNG_SIGNATURE)) return 'png';
  if (startsWith(head, GIF87A) || startsWith(head, GIF89A)) return 'gif';
  return 'unknown';
}

/**
 * Lowercased text after the last dot, or '' when there is none
 */
export function extensionOf(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  if (dot <= 0 || dot === base.length - 1) {
    return '';
  }
  return base.slice(dot + 1).toLowerCase();
}

/**
 * Normalized type for an allowed extension, undefined otherwise
 */
export function fileTypeForExtension(extension: string): ImageFileType | undefined {
  return EXTENSION_TYPES[extension.toLowerCase()];
}

function fileTypeForMime(contentType: string): ImageFileType | 'other-image' | undefined {
  const mime = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  if (!mime.startsWith('image/')) {
    return undefined;
  }
  return MIME_TYPES[mime] ?? 'other-image';
}

export function validateUpload(
  candidate: UploadCandidate,
  policy: ValidationPolicy
): ValidationResult {
  if (candidate.size > policy.maxFileSize) {
    return {
      ok: false,
      kind: 'TooLarge',
      message: `File exceeds maximum file size of ${policy.maxFileSize} bytes.`
    };
  }

  const extension = extensionOf(candidate.filename);
  const fileType = fileTypeForExtension(extension);
  if (!fileType) {
    return {
      ok: false,
      kind: 'UnsupportedType',
      message: extension
        ? `File type .${extension} is not supported. Allowed: ${ALLOWED_EXTENSIONS.join(', ')}.`
        : `File has no extension. Allowed: ${ALLOWED_EXTENSIONS.join(', ')}.`
    };
  }

  const sniffed = sniffImageType(candidate.head);
  if (sniffed !== fileType) {
    return {
      ok: false,
      kind: 'TypeMismatch',
      message: sniffed === 'unknown'
        ? `File content is not a valid ${fileType} image.`
        : `File content is ${sniffed}, but the name says ${fileType}.`
    };
  }

  if (candidate.contentType) {
    const declared = fileTypeForMime(candidate.contentType);
    if (declared !== undefined && declared !== fileType) {
      return {
        ok: false,
        kind: 'TypeMismatch',
        message: `Declared content type ${candidate.contentType} does not match ${fileType} content.`
      };
    }
  }

  return { ok: true, fileType };
}
