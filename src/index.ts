export { IngestClient } from './client.js';
export type { ClientStats } from './client.js';
export { IngestError, ClientClosedError, ConfigurationError } from './errors.js';
export { bearerAuth, basicAuth, headerAuth } from './auth.js';
export type { TokenSource } from './auth.js';
export { createLogger, LOG_LEVEL_ENV } from './logger.js';
export type {
  AuthDecorator,
  BackpressureMode,
  ClientState,
  FlushOutcome,
  IngestClientOptions,
  RetryOptions,
  Transport,
} from './types.js';
