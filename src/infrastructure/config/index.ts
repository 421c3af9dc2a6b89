export { loadPipelineConfig, ConfigError } from './pipeline-config.js';
export type { PipelineConfig, SinkConfig, LoadConfigOptions } from './pipeline-config.js';
export { parseSections } from './sections.js';
export type { ConfigSections } from './sections.js';
