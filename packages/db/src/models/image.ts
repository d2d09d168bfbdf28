/**
 * Image model
 */

import type { DBService } from '../connection.js';

// --- Types ---

export const IMAGE_FILE_TYPES = ['jpg', 'png', 'gif'] as const;

export type ImageFileType = (typeof IMAGE_FILE_TYPES)[number];

export interface ImageRecord {
  id: number;
  /** Server-generated storage name */
  filename: string;
  /** Client-supplied name, display only */
  originalName: string;
  size: number;
  /** ISO-8601 UTC */
  uploadTime: string;
  fileType: ImageFileType;
}

export interface CreateImage {
  filename: string;
  originalName: string;
  size: number;
  fileType: ImageFileType;
  /** Defaults to the database clock */
  uploadTime?: string;
}

export interface PageQuery {
  limit: number;
  offset: number;
}

export interface ImagePageRows {
  records: ImageRecord[];
  total: number;
}

// --- Row mapping ---

interface ImageRow {
  id: number;
  filename: string;
  original_name: string;
  size: number;
  upload_time: string;
  file_type: string;
}

export function isImageFileType(value: string): value is ImageFileType {
  return IMAGE_FILE_TYPES.some((type) => type === value);
}

function rowToImage(row: ImageRow): ImageRecord {
  if (!isImageFileType(row.file_type)) {
    throw new Error(`Image ${row.id} has unknown file_type "${row.file_type}"`);
  }
  return {
    id: row.id,
    filename: row.filename,
    originalName: row.original_name,
    size: row.size,
    uploadTime: row.upload_time,
    fileType: row.file_type
  };
}

const SELECT_COLUMNS = 'id, filename, original_name, size, upload_time, file_type';

// --- Image Repository ---

export class ImageRepository {
  constructor(private db: DBService) {}

  /**
   * Insert a record; a single statement, so no partial row is ever visible
   */
  create(data: CreateImage): ImageRecord {
    const database = this.db.database;
    const result = data.uploadTime
      ? database.prepare<[string, string, number, string, string]>(`
          INSERT INTO images (filename, original_name, size, file_type, upload_time)
          VALUES (?, ?, ?, ?, ?)
        `).run(data.filename, data.originalName, data.size, data.fileType, data.uploadTime)
      : database.prepare<[string, string, number, string]>(`
          INSERT INTO images (filename, original_name, size, file_type)
          VALUES (?, ?, ?, ?)
        `).run(data.filename, data.originalName, data.size, data.fileType);

    const id = Number(result.lastInsertRowid);
    const created = this.findById(id);
    if (!created) {
      throw new Error(`Image ${id} missing right after insert`);
    }
    return created;
  }

  findById(id: number): ImageRecord | undefined {
    const row = this.db.database.prepare<[number], ImageRow>(`
      SELECT ${SELECT_COLUMNS}
      FROM images
      WHERE id = ?
    `).get(id);

    return row ? rowToImage(row) : undefined;
  }

  /**
   * Count total images
   */
  countAll(): number {
    const row = this.db.database.prepare<[], { count: number }>(
      'SELECT COUNT(*) as count FROM images'
    ).get();
    return row?.count ?? 0;
  }

  /**
   * Newest first; equal timestamps fall back to the larger id
   */
  findPage(query: PageQuery): ImageRecord[] {
    const rows = this.db.database.prepare<[number, number], ImageRow>(`
      SELECT ${SELECT_COLUMNS}
      FROM images
      ORDER BY upload_time DESC, id DESC
      LIMIT ? OFFSET ?
    `).all(query.limit, query.offset);

    return rows.map(rowToImage);
  }

  /**
   * Count and page read from one snapshot
   */
  findPageWithTotal(query: PageQuery): ImagePageRows {
    return this.db.transaction(() => ({
      total: this.countAll(),
      records: this.findPage(query)
    }));
  }

  /**
   * Returns true when a row was removed
   */
  delete(id: number): boolean {
    const result = this.db.database.prepare<[number]>('DELETE FROM images WHERE id = ?').run(id);
    return result.changes > 0;
  }
}
