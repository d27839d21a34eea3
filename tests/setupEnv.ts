// Vitest bootstraps this before app/config imports.
process.env.NODE_ENV = 'test';
process.env.DATABASE_PATH = ':memory:';

if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}

// Avoid rate limiting interfering with automated tests.
if (!process.env.ENABLE_RATE_LIMIT) {
  process.env.ENABLE_RATE_LIMIT = 'false';
}
