export { ingestRoutes } from './ingest-routes.js';
export type { IngestRoutesOptions } from './ingest-routes.js';
export { default as statsRoutes } from './stats-routes.js';
export type { StatsRoutesOptions } from './stats-routes.js';
