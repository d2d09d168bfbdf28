/**
 * Image service
 *
 * Upload, listing and deletion of hosted images. The file store and the
 * metadata store are not updated atomically together: upload undoes its
 * file write when the insert fails, delete treats the row as the source
 * of truth and removes the file on a best-effort basis.
 */

import { randomUUID } from 'node:crypto';

import {
  ImageRepository,
  type DBService,
  type ImageFileType,
  type ImageRecord
} from '@pixhold/db';
import type { Logger } from '@pixhold/utils';

import type { FileStore } from './file-store.js';
import { validateUpload, type ValidationFailureKind } from './image-validator.js';
import { normalizePage, pageOffset, summarize, type PaginationSummary } from './pagination.js';

// ── Error ──

export type ImageErrorCode =
  | 'validation_failed'
  | 'storage_write_failed'
  | 'metadata_write_failed'
  | 'metadata_delete_failed'
  | 'not_found'
  | 'invalid_page';

export class ImageError extends Error {
  readonly code: ImageErrorCode;
  /** Set for validation_failed */
  readonly kind?: ValidationFailureKind;

  constructor(
    code: ImageErrorCode,
    message: string,
    options: { kind?: ValidationFailureKind; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ImageError';
    this.code = code;
    this.kind = options.kind;
  }

  static validationFailed(kind: ValidationFailureKind, message: string): ImageError {
    return new ImageError('validation_failed', message, { kind });
  }

  static storageWriteFailed(filename: string, cause: unknown): ImageError {
    return new ImageError('storage_write_failed', `Failed to store file ${filename}`, { cause });
  }

  static metadataWriteFailed(filename: string, cause: unknown): ImageError {
    return new ImageError('metadata_write_failed', `Failed to save metadata for ${filename}`, { cause });
  }

  static metadataDeleteFailed(id: number, cause: unknown): ImageError {
    return new ImageError('metadata_delete_failed', `Image ${id} could not be deleted`, { cause });
  }

  static notFound(id: number): ImageError {
    return new ImageError('not_found', `Image ${id} not found`);
  }

  static invalidPage(raw: string): ImageError {
    return new ImageError('invalid_page', `Invalid page number: ${JSON.stringify(raw)}`);
  }
}

// ── Helpers ──

/**
 * Join the public base path (or absolute base URL) with a storage filename
 */
export function buildPublicUrl(basePath: string, filename: string): string {
  return `${basePath.replace(/\/+$/, '')}/${encodeURIComponent(filename)}`;
}

/** 32 hex characters of a random UUID plus the normalized extension */
export function generateStorageFilename(fileType: ImageFileType): string {
  return `${randomUUID().replace(/-/g, '')}.${fileType}`;
}

// ── ImageService ──

export interface ImageServiceOptions {
  maxFileSize: number;
  publicBasePath: string;
  pageSize: number;
  now?: () => Date;
  generateFilename?: (fileType: ImageFileType) => string;
}

export interface UploadOptions {
  /** Size the client announced; checked alongside the actual length */
  declaredSize?: number;
  contentType?: string;
}

export interface UploadResult {
  record: ImageRecord;
  url: string;
}

export interface ImageListItem extends ImageRecord {
  url: string;
}

export interface ImagePage {
  records: ImageListItem[];
  pagination: PaginationSummary;
}

export class ImageService {
  private repo: ImageRepository;
  private now: () => Date;
  private generateFilename: (fileType: ImageFileType) => string;

  constructor(
    db: DBService,
    private fileStore: FileStore,
    private options: ImageServiceOptions,
    private logger: Logger
  ) {
    this.repo = new ImageRepository(db);
    this.now = options.now ?? (() => new Date());
    this.generateFilename = options.generateFilename ?? generateStorageFilename;
  }

  get pageSize(): number {
    return this.options.pageSize;
  }

  publicUrl(filename: string): string {
    return buildPublicUrl(this.options.publicBasePath, filename);
  }

  async upload(
    content: Buffer,
    originalName: string,
    uploadOptions: UploadOptions = {}
  ): Promise<UploadResult> {
    const verdict = validateUpload(
      {
        filename: originalName,
        contentType: uploadOptions.contentType,
        size: Math.max(content.length, uploadOptions.declaredSize ?? 0),
        head: content.subarray(0, 16)
      },
      { maxFileSize: this.options.maxFileSize }
    );

    if (!verdict.ok) {
      this.logger.warn(
        { op: 'upload', originalName, size: content.length, kind: verdict.kind },
        `Upload rejected: ${verdict.message}`
      );
      throw ImageError.validationFailed(verdict.kind, verdict.message);
    }

    const filename = this.generateFilename(verdict.fileType);

    try {
      await this.fileStore.write(filename, content);
    } catch (err) {
      this.logger.error({ op: 'upload', err, filename, originalName }, 'Failed to write image file');
      throw ImageError.storageWriteFailed(filename, err);
    }

    let record: ImageRecord;
    try {
      record = this.repo.create({
        filename,
        originalName,
        size: content.length,
        fileType: verdict.fileType,
        uploadTime: this.now().toISOString()
      });
    } catch (err) {
      this.logger.error({ op: 'upload', err, filename, originalName }, 'Failed to insert image metadata');
      await this.discardFile(filename);
      throw ImageError.metadataWriteFailed(filename, err);
    }

    const url = this.publicUrl(filename);
    this.logger.info(
      { op: 'upload', id: record.id, filename, originalName, size: record.size, fileType: record.fileType },
      `Uploaded '${originalName}' as '${filename}'`
    );

    return { record, url };
  }

  list(page: number, pageSize: number = this.options.pageSize): ImagePage {
    const currentPage = normalizePage(page);
    const { records, total } = this.repo.findPageWithTotal({
      limit: pageSize,
      offset: pageOffset(currentPage, pageSize)
    });

    this.logger.debug({ op: 'list', page: currentPage, count: records.length, total }, 'Listed images');

    return {
      records: records.map((record) => ({ ...record, url: this.publicUrl(record.filename) })),
      pagination: summarize(currentPage, pageSize, total)
    };
  }

  /**
   * Remove the row, then the file. Returns the deleted record.
   */
  async delete(id: number): Promise<ImageRecord> {
    const image = this.repo.findById(id);
    if (!image) {
      throw ImageError.notFound(id);
    }

    let removed: boolean;
    try {
      removed = this.repo.delete(id);
    } catch (err) {
      this.logger.error({ op: 'delete', err, id, filename: image.filename }, 'Failed to delete image metadata');
      throw ImageError.metadataDeleteFailed(id, err);
    }

    // Lost a race with a concurrent delete
    if (!removed) {
      throw ImageError.notFound(id);
    }

    try {
      const existed = await this.fileStore.remove(image.filename);
      if (!existed) {
        this.logger.warn({ op: 'delete', id, filename: image.filename }, 'Image file was already missing');
      }
    } catch (err) {
      this.logger.error({ op: 'delete', err, id, filename: image.filename }, 'Failed to delete image file');
    }

    this.logger.info({ op: 'delete', id, filename: image.filename }, `Image ${id} deleted`);
    return image;
  }

  /** Compensating delete after a failed insert; never masks the insert error */
  private async discardFile(filename: string): Promise<void> {
    try {
      await this.fileStore.remove(filename);
    } catch (err) {
      this.logger.error({ op: 'upload', err, filename }, 'Failed to remove orphaned image file');
    }
  }
}
