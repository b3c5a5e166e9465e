/**
 * Runs before every test file: keeps pino quiet and off the pretty transport.
 */
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
