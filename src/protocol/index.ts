/**
 * Flame Connect binary parameter protocol
 */

export * from './parameter-types';
export * from './protocol-error';
export * from './wire';
export * from './decoders';
export * from './encoders';
export * from './display-names';
