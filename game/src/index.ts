export { config, loadConfig } from './config.js';
export type { GameConfig } from './config.js';
export * from './repo/index.js';
