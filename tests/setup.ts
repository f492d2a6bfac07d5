/**
 * Global test environment. Runs before any module reads the configuration.
 */

process.env.NODE_ENV = 'test';
process.env.ANTHROPIC_API_KEY = 'test-api-key';
process.env.RECORD_STORE_URL = 'http://record-store.test';
process.env.RECORD_STORE_TOKEN = 'test-token';
process.env.SESSION_VIOLATION_LIMIT = '0';
