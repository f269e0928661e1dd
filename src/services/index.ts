export * from './base-fire.service';
export * from './fireplace.service';
export * from './flame.service';
export * from './heater.service';
