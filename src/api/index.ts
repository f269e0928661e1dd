/**
 * Flame Connect cloud client
 */

export * from './flameconnect-types';
export * from './flameconnect-schemas';
export * from './https-client';
export * from './token-storage';
export * from './b2c-login';
export * from './flameconnect-oauth';
export * from './flameconnect-api';
export * from './parameter-envelope';
export * from './fire-commands';
export * from './flameconnect-fire';
export * from './flameconnect-controller';
export * from './fire.repository';
