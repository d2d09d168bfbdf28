/**
 * @pixhold/server
 *
 * HTTP API server:
 * - POST /upload
 * - GET /images-list
 * - DELETE /delete/:id
 * - GET /images/:filename
 * - /api/health
 */

export * from './app.js';
export * from './error.js';
export * from './routes/index.js';
