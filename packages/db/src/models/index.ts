/**
 * Database models
 */

export {
  type ImageRecord,
  type ImageFileType,
  type CreateImage,
  type PageQuery,
  type ImagePageRows,
  IMAGE_FILE_TYPES,
  isImageFileType,
  ImageRepository
} from './image.js';
