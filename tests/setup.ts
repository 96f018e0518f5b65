/**
 * Jest setup file
 * This file is run before any tests, setting up mocks and environment
 */

// Set test environment variables before any configuration is loaded
process.env.NODE_ENV = 'test';
process.env.TZ = 'UTC';
process.env.DISCORD_BOT_TOKEN = 'test-token';

// Mock logger to prevent console output during tests
jest.mock('../src/lib/logger', () => ({
  logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    fatal: jest.fn(),
  },
}));
