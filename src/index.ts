/**
 * Program Massing
 *
 * Main entry point for the library
 */

export * from './algorithm';

// Export logger utility
export { Logger, LogLevel, enableDebugLogging, disableLogging } from './algorithm/utils/logger';

// Version info
export const VERSION = '0.5.0';
export const NAME = 'Program Massing';
