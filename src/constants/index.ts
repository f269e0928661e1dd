/**
 * Constants Index
 *
 * Re-exports all constants from domain-specific files.
 */

// Time constants
export * from './time.constants';

// API constants
export * from './api.constants';

// Fireplace constants
export * from './fireplace.constants';

// Authentication constants
export * from './auth.constants';
