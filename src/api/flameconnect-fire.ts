/**
 * Flame Connect Fire
 *
 * Represents a fireplace from the cloud API: its identity plus the last
 * decoded parameters. Writes go through the controller and are applied to
 * the local state once the cloud has accepted them.
 */

import {EventEmitter} from 'node:events';
import {Fire, FireOverview} from './flameconnect-types';
import {Parameter, ParameterOf, WritableParameter} from '../protocol';
import {FireMode, ParameterKind, TemperatureUnit} from '../types/flameconnect-enums';
import {
    findParameter,
    FlameEffectChanges,
    HeatSettingsChanges,
    mergeParameters,
    temperatureUnitParameter,
    timerParameter,
    turnOffParameters,
    turnOnParameters,
    updateFlameEffect,
    updateHeatSettings,
} from './fire-commands';

export interface ParameterWriter {
    writeParameters(fireId: string, params: readonly Parameter[]): Promise<void>;
}

export class FlameConnectFire extends EventEmitter {
    private fire: Fire;
    private parameters: Parameter[];
    private lastUpdated: Date = new Date();

    constructor(
        overview: FireOverview,
        private readonly writer: ParameterWriter,
    ) {
        super();
        this.fire = overview.fire;
        this.parameters = overview.parameters;
    }

    getId(): string {
        return this.fire.fireId;
    }

    getName(): string {
        return this.fire.friendlyName;
    }

    getFire(): Fire {
        return this.fire;
    }

    getParameters(): readonly Parameter[] {
        return this.parameters;
    }

    getParameter<K extends ParameterKind>(kind: K): ParameterOf<K> | undefined {
        return findParameter(this.parameters, kind);
    }

    hasParameter(kind: ParameterKind): boolean {
        return this.getParameter(kind) !== undefined;
    }

    /**
     * Get the last update timestamp
     */
    getLastUpdated(): Date {
        return this.lastUpdated;
    }

    isOn(): boolean {
        return this.getParameter(ParameterKind.MODE)?.mode === FireMode.MANUAL;
    }

    /**
     * Unit the fire reports temperatures in; Celsius when unknown
     */
    getTemperatureUnit(): TemperatureUnit {
        return this.getParameter(ParameterKind.TEMPERATURE_UNIT)?.unit ?? TemperatureUnit.CELSIUS;
    }

    /**
     * Replace identity and parameters with a fresh overview
     */
    updateOverview(overview: FireOverview): void {
        this.fire = overview.fire;
        this.parameters = overview.parameters;
        this.lastUpdated = new Date();
        this.emit('updated');
    }

    /**
     * Write parameters and apply them locally once the write succeeded
     */
    async setParameters(params: readonly WritableParameter[]): Promise<void> {
        await this.writer.writeParameters(this.getId(), params);
        this.parameters = mergeParameters(this.parameters, params);
        this.lastUpdated = new Date();
        this.emit('updated');
    }

    async turnOn(): Promise<void> {
        await this.setParameters(turnOnParameters(this.parameters));
    }

    async turnOff(): Promise<void> {
        await this.setParameters(turnOffParameters(this.parameters));
    }

    async setFlameEffect(changes: FlameEffectChanges): Promise<void> {
        await this.setParameters([updateFlameEffect(this.parameters, changes)]);
    }

    async setHeatSettings(changes: HeatSettingsChanges): Promise<void> {
        await this.setParameters([updateHeatSettings(this.parameters, changes)]);
    }

    async setTimer(minutes: number): Promise<void> {
        await this.setParameters([timerParameter(minutes)]);
    }

    async setTemperatureUnit(unit: TemperatureUnit): Promise<void> {
        await this.setParameters([temperatureUnitParameter(unit)]);
    }

    /**
     * Accessory contexts are persisted as JSON; only the data is kept, never the writer
     */
    toJSON(): FireOverview {
        return {fire: this.fire, parameters: this.parameters};
    }
}
