/**
 * Jest test setup file
 *
 * Runs before each test file is loaded.
 */

// Keep test output to errors; loggers read the level on first use
process.env['LOG_LEVEL'] = process.env['LOG_LEVEL'] ?? 'ERROR';

jest.setTimeout(30000);
