/**
 * Local deployment: SQLite file plus a directory on this machine
 */

import { DBService } from '@pixhold/db';
import { FileStore, ImageService, type AppConfig, type ImageServiceOptions } from '@pixhold/services';
import type { Logger } from '@pixhold/utils';

import type { Deployment } from './index.js';

export interface LocalDeploymentOptions {
  /** Overrides for the image service (clock, filename generator) */
  imageService?: Pick<ImageServiceOptions, 'now' | 'generateFilename'>;
}

export class LocalDeployment implements Deployment {
  private _db: DBService | null = null;
  private _fileStore: FileStore;
  private _images: ImageService | null = null;

  constructor(
    private readonly _config: AppConfig,
    private readonly _logger: Logger,
    private readonly options: LocalDeploymentOptions = {}
  ) {
    this._fileStore = new FileStore(_config.uploadDir, _logger.child({ component: 'file-store' }));
  }

  async initialize(): Promise<void> {
    await this._fileStore.init();

    this._db = DBService.create({
      dbPath: this._config.dbPath,
      logger: this._logger.child({ component: 'db' })
    });

    this._images = new ImageService(
      this._db,
      this._fileStore,
      {
        maxFileSize: this._config.maxFileSize,
        publicBasePath: this._config.publicBasePath,
        pageSize: this._config.pageSize,
        ...this.options.imageService
      },
      this._logger.child({ component: 'images' })
    );

    this._logger.info(
      { uploadDir: this._config.uploadDir, dbPath: this._config.dbPath },
      'Deployment initialized'
    );
  }

  config(): AppConfig {
    return this._config;
  }

  logger(): Logger {
    return this._logger;
  }

  db(): DBService {
    if (!this._db) {
      throw new Error('Database not initialized. Call initialize() first.');
    }
    return this._db;
  }

  fileStore(): FileStore {
    return this._fileStore;
  }

  images(): ImageService {
    if (!this._images) {
      throw new Error('Image service not initialized. Call initialize() first.');
    }
    return this._images;
  }

  async cleanup(): Promise<void> {
    this._db?.close();
    this._db = null;
    this._images = null;
  }
}
