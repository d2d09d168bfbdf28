/**
 * Images routes
 *
 * fastify.deployment → deployment.images() → ImageService
 *
 * POST   /upload             multipart field `file`
 * GET    /images-list?page=n newest first, fixed page size
 * DELETE /delete/:id
 * GET    /images/:filename   raw bytes
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { MultipartFile } from '@fastify/multipart';
import {
  contentTypeFor,
  ImageError,
  type ImageListItem,
  type PaginationSummary
} from '@pixhold/services';
import { isPlainFilename, successResponse } from '@pixhold/utils';

import { ApiError } from '../error.js';

// Types

export interface UploadResponseBody {
  message: string;
  filename: string;
  url: string;
}

export interface ImageJson {
  id: number;
  filename: string;
  original_name: string;
  size_kb: number;
  upload_time: string;
  file_type: string;
  url: string;
}

export interface PaginationJson {
  current_page: number;
  total_pages: number;
  total_items: number;
  has_prev: boolean;
  has_next: boolean;
}

export interface ImageListResponseBody {
  page: number;
  pagination: PaginationJson;
  data: ImageJson[];
}

const UPLOAD_FIELD = 'file';

// Helpers

export function toImageJson(image: ImageListItem): ImageJson {
  return {
    id: image.id,
    filename: image.filename,
    original_name: image.originalName,
    size_kb: Math.round((image.size / 1024) * 100) / 100,
    upload_time: new Date(image.uploadTime).toISOString(),
    file_type: image.fileType,
    url: image.url
  };
}

export function toPaginationJson(summary: PaginationSummary): PaginationJson {
  return {
    current_page: summary.currentPage,
    total_pages: summary.totalPages,
    total_items: summary.totalItems,
    has_prev: summary.hasPrev,
    has_next: summary.hasNext
  };
}

/**
 * Missing or empty → 1. Integers pass through (the service clamps values
 * below 1); anything else, a repeated parameter included, is an invalid page.
 */
export function parsePageParam(raw: string | string[] | undefined): number {
  if (Array.isArray(raw)) {
    throw ImageError.invalidPage(raw.join(','));
  }
  if (raw === undefined || raw.trim() === '') {
    return 1;
  }
  const trimmed = raw.trim();
  if (!/^[-+]?\d+$/.test(trimmed)) {
    throw ImageError.invalidPage(raw);
  }
  const page = Number(trimmed);
  return Number.isSafeInteger(page) ? page : Number.MAX_SAFE_INTEGER;
}

/**
 * Request Content-Length as the client-declared upload size. It covers the
 * whole multipart body, so it is an upper bound on the file itself.
 */
export function parseDeclaredSize(header: string | undefined): number | undefined {
  if (header === undefined || !/^\d+$/.test(header.trim())) {
    return undefined;
  }
  const size = Number(header.trim());
  return Number.isSafeInteger(size) ? size : undefined;
}

function parseImageId(raw: string): number {
  const id = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(id)) {
    throw ApiError.badRequest(`Invalid image id: ${JSON.stringify(raw)}`);
  }
  return id;
}

export const imageRoutes: FastifyPluginAsync = async (fastify: FastifyInstance) => {
  const images = () => fastify.deployment.images();
  const fileStore = () => fastify.deployment.fileStore();
  const maxFileSize = fastify.deployment.config().maxFileSize;

  async function readUpload(part: MultipartFile): Promise<Buffer> {
    try {
      return await part.toBuffer();
    } catch (err) {
      if (err instanceof fastify.multipartErrors.RequestFileTooLargeError) {
        throw ImageError.validationFailed(
          'TooLarge',
          `File exceeds maximum file size of ${maxFileSize} bytes.`
        );
      }
      throw err;
    }
  }

  // POST /upload - Upload image (multipart)
  fastify.post('/upload', async (request) => {
    if (!request.isMultipart()) {
      throw ApiError.badRequest('Expecting multipart/form-data');
    }

    const part = await request.file();
    if (!part || part.fieldname !== UPLOAD_FIELD) {
      part?.file.resume();
      throw ApiError.badRequest('File field not found in form');
    }
    if (!part.filename) {
      part.file.resume();
      throw ApiError.badRequest('File name is missing');
    }

    const content = await readUpload(part);
    const { record, url } = await images().upload(content, part.filename, {
      contentType: part.mimetype,
      declaredSize: parseDeclaredSize(request.headers['content-length'])
    });

    return successResponse<UploadResponseBody>({
      message: 'File successfully uploaded.',
      filename: record.filename,
      url
    });
  });

  // GET /images-list - Paginated listing
  fastify.get<{ Querystring: { page?: string | string[] } }>('/images-list', async (request) => {
    const page = parsePageParam(request.query.page);
    const { records, pagination } = images().list(page);

    return successResponse<ImageListResponseBody>({
      page: pagination.currentPage,
      pagination: toPaginationJson(pagination),
      data: records.map(toImageJson)
    });
  });

  // DELETE /delete/:id - Delete image
  fastify.delete<{ Params: { id: string } }>('/delete/:id', async (request) => {
    const id = parseImageId(request.params.id);
    await images().delete(id);

    return successResponse({ message: `Image ${id} deleted` });
  });

  // GET /images/:filename - Serve image
  fastify.get<{ Params: { filename: string } }>('/images/:filename', async (request, reply) => {
    const { filename } = request.params;

    if (!isPlainFilename(filename) || filename.startsWith('.')) {
      throw ApiError.notFound('Image not found');
    }

    const content = await fileStore().read(filename);
    if (!content) {
      throw ApiError.notFound('Image not found');
    }

    return reply
      .header('Content-Type', contentTypeFor(filename))
      .header('Cache-Control', 'public, max-age=31536000, immutable')
      .send(content);
  });
};
