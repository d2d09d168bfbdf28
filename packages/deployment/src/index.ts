/**
 * @pixhold/deployment
 *
 * Deployment abstraction. Everything the HTTP layer needs is reached
 * through a Deployment, built once at startup and handed to the server.
 */

import type { DBService } from '@pixhold/db';
import type { AppConfig, FileStore, ImageService } from '@pixhold/services';
import type { Logger } from '@pixhold/utils';

export interface Deployment {
  /** Open stores and prepare directories */
  initialize(): Promise<void>;

  config(): AppConfig;

  logger(): Logger;

  db(): DBService;

  fileStore(): FileStore;

  images(): ImageService;

  /** Release resources */
  cleanup(): Promise<void>;
}

export { LocalDeployment, type LocalDeploymentOptions } from './local.js';
