// Quiet, deterministic environment for every test file. Runs before any
// application module is imported, so the logger picks these up.
process.env['NODE_ENV'] = 'test';
process.env['LOG_LEVEL'] = 'silent';
