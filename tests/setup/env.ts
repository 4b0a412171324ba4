/**
 * Test environment
 *
 * Runs before every test file, ahead of the config module.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.CONCEPTS_SKIP_REMOTE = '1';
process.env.CONCEPTS_JSON = '';
