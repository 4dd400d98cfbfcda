/**
 * Jest Test Setup
 * Global test configuration and setup
 */

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.GITHUB_TOKEN = 'test-secret';
process.env.MONGODB_URI = 'mongodb://localhost:27017/starcrawl-test';

// Keep crawl progress logging out of test output
jest.spyOn(console, 'log').mockImplementation(() => undefined);
jest.spyOn(console, 'debug').mockImplementation(() => undefined);
jest.spyOn(console, 'warn').mockImplementation(() => undefined);
jest.spyOn(console, 'error').mockImplementation(() => undefined);
