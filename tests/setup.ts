/**
 * Jest setup: keep test output free of relay logs
 */

process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
