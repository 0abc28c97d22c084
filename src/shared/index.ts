/**
 * Shared utilities and configuration exports
 */

// Utilities
export * from './utils';

// Services
export * from './services/resilience-service';

// Configuration
export * from './config/constants';
export * from './config/environment';
