export * from './base-accessory';
export * from './fireplace-accessory';
