export * from './types/index.js';

export { COMMONROOM_VERSION } from './version.js';

export {
  loadConfig,
  loadConfigOrDefaults,
  parseConfig,
  defaultConfig,
  interpolateEnvVars,
  CONFIG_FILE_NAME,
} from './config/config-parser.js';

export * from './auth/index.js';
export * from './presence/index.js';
export * from './registration/index.js';
export * from './mail/index.js';
export * from './storage/index.js';
export * from './content/index.js';

export { systemClock, ManualClock } from './utils/clock.js';
export type { Clock } from './utils/clock.js';
export { escapeHtml } from './utils/html.js';

export { createRuntime, RuntimeError } from './runtime.js';
export type { CommunityRuntime, RuntimeOptions } from './runtime.js';
