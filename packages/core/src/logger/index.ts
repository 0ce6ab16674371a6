/**
 * File: packages/core/src/logger/index.ts
 * Purpose: Public API exports for the ticketflow logging system
 * Relationships: Entry point for all logger functionality
 * Key Dependencies: factory.ts, context.ts, types.ts
 */

export { getLogger, createLogger, resetLogger } from './factory.js';

export {
  getContext,
  getContextLogger,
  runJob,
  runStep,
  runWithContext
} from './context.js';

export type {
  Logger,
  LoggerOptions,
  Bindings,
  LogLevel,
  LoggerConfig,
  JobContext,
  RotationConfig
} from './types.js';

export { LogLevels, isLogLevel } from './types.js';
