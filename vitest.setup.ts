process.env.NODE_ENV = 'test';
// Tests that inspect warnings construct their loggers with an explicit level.
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';

// Overrides from the developer's shell must not leak into tests.
delete process.env.DB_PATH;
delete process.env.FILE_ORGANIZER_CONFIG;
