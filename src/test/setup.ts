// Jest test setup
import { config } from '@dotenvx/dotenvx';

// Load test environment variables (LOG_LEVEL=silent) for every suite.
// Config and integration tests manage their own environment isolation.
config( { path: '.env.test', quiet: true } );

// Mock console methods so CLI-style output does not clutter test runs
global.console = {
    ...console,
    log: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
};
