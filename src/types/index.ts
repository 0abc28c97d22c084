/**
 * Main types export file for the Weather Analytics Engine
 */

// Core types
export * from './core';

// Observation and forecast types
export * from './weather';

// Derived metric types
export * from './metrics';

// Alert types
export * from './alert';
