/**
 * @pixhold/services
 *
 * Business logic for the image host:
 * - config: layered configuration
 * - image-validator: size, extension and signature checks
 * - file-store: atomic on-disk storage
 * - pagination: page/offset math
 * - image: upload, list and delete
 */

export * from './config.js';
export * from './image-validator.js';
export * from './file-store.js';
export * from './pagination.js';
export * from './image.js';
