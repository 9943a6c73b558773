/**
 * Jest setup file - runs before all tests
 */

// Set test environment variables
process.env['NODE_ENV'] = 'test';
