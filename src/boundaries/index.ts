export { parseEnvironment, pricingFromEnv } from './env-parser';
export { parseVerifyOptions, parseAggregateOptions } from './cli-parser';
export { loadConfig, parseIniGlobals } from './config-loader';
export { ChunkIndex, loadChunkIndex } from './chunk-store';
export { readJsonl, readJsonlIfExists, appendJsonl, writeJsonl } from './jsonl';
