export { delay } from './delay.js';
export { createLogger, errorMessage, type LoggerOptions } from './logger.js';
export { extractHost, registrableDomain } from './domain.js';
export { compilePatterns, filterValidSelectors } from './selectors.js';
export { USER_AGENTS, getRandomUserAgent } from './user-agents.js';
