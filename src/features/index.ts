export * from './base-feature';
export * from './feature-manager';
export * from './pulsating-effect.feature';
export * from './media-light.feature';
export * from './overhead-light.feature';
export * from './boost-mode.feature';
export * from './timer.feature';
