/**
 * API routes
 */

export { healthRoutes, type HealthResponse } from './health.js';
export {
  imageRoutes,
  parseDeclaredSize,
  parsePageParam,
  toImageJson,
  toPaginationJson,
  type ImageJson,
  type PaginationJson,
  type ImageListResponseBody,
  type UploadResponseBody
} from './images.js';
