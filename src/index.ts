export { CodeReviewer } from './reviewer.js';
export { GeminiClient, toApiError, type ModelClient, type GeminiClientOptions } from './model-client.js';
export { GitReader, isRemoteRepository, withRepository } from './git-reader.js';
export { DEFAULT_CONFIG, loadConfig, type AppConfig } from './config.js';
export { createApp, startServer } from './web/server.js';
export { createProgram, runCli, type CliContext } from './cli.js';
export * from './errors.js';
export * from './types.js';
