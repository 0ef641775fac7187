/**
 * Vitest Setup File
 * Global test configuration
 */

// Quiet loggers unless a test opts in
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
