import {CharacteristicValue, PlatformAccessory, Service} from 'homebridge';
import {FlameConnectAccessoryContext, FlameConnectPlatform} from '../platform';
import {BaseFireService} from './base-fire.service';
import {HeatStatus, ParameterKind, TemperatureUnit} from '../types/flameconnect-enums';
import {fromCelsius, toCelsius} from '../utils/temperature';
import {
    DEFAULT_TARGET_TEMPERATURE,
    HOMEKIT_HEAT_TEMP_MAX,
    HOMEKIT_HEAT_TEMP_MIN,
    HOMEKIT_HEAT_TEMP_STEP,
} from '../constants';

/**
 * Heater of a fire with a heating element. The fire has no room sensor,
 * so the current temperature mirrors the setpoint.
 */
export class HeaterService extends BaseFireService {
    private readonly service: Service;

    constructor(
        platform: FlameConnectPlatform,
        accessory: PlatformAccessory<FlameConnectAccessoryContext>,
    ) {
        super(platform, accessory);

        const serviceName = `${this.name} Heater`;
        this.service = this.accessory.getService(this.platform.Service.HeaterCooler)
            || this.accessory.addService(this.platform.Service.HeaterCooler, serviceName);

        this.service.setCharacteristic(this.platform.Characteristic.Name, serviceName);

        // Required characteristic
        this.service.getCharacteristic(this.platform.Characteristic.Active)
            .onGet(this.handleActiveStateGet.bind(this))
            .onSet(this.handleActiveStateSet.bind(this));

        // Required characteristic
        this.service.getCharacteristic(this.platform.Characteristic.CurrentHeaterCoolerState)
            .onGet(this.handleCurrentHeaterCoolerStateGet.bind(this));

        // Required characteristic
        this.service.getCharacteristic(this.platform.Characteristic.TargetHeaterCoolerState)
            .setProps({
                validValues: [this.platform.Characteristic.TargetHeaterCoolerState.HEAT],
            })
            .onGet(this.handleTargetHeaterCoolerStateGet.bind(this));

        // Required characteristic
        this.service.getCharacteristic(this.platform.Characteristic.CurrentTemperature)
            .onGet(this.handleCurrentTemperatureGet.bind(this));

        const heatingChar = this.service.getCharacteristic(this.platform.Characteristic.HeatingThresholdTemperature);
        // Set value within the range first to avoid a warning when setProps narrows it
        heatingChar.updateValue(this.clampedSetpoint());
        heatingChar
            .setProps({
                minStep: HOMEKIT_HEAT_TEMP_STEP,
                minValue: HOMEKIT_HEAT_TEMP_MIN,
                maxValue: HOMEKIT_HEAT_TEMP_MAX,
            })
            .onGet(this.handleHeatingThresholdTemperatureGet.bind(this))
            .onSet(this.handleHeatingThresholdTemperatureSet.bind(this));

        this.service.getCharacteristic(this.platform.Characteristic.TemperatureDisplayUnits)
            .onGet(this.handleTemperatureDisplayUnitsGet.bind(this))
            .onSet(this.handleTemperatureDisplayUnitsSet.bind(this));
    }

    refresh(): void {
        const {Characteristic} = this.platform;
        this.service.updateCharacteristic(Characteristic.Active, this.activeState());
        this.service.updateCharacteristic(Characteristic.CurrentHeaterCoolerState, this.currentHeaterCoolerState());
        this.service.updateCharacteristic(Characteristic.CurrentTemperature, this.setpointCelsius());
        this.service.updateCharacteristic(Characteristic.HeatingThresholdTemperature, this.clampedSetpoint());
        this.service.updateCharacteristic(Characteristic.TemperatureDisplayUnits, this.displayUnits());
    }

    async handleActiveStateGet(): Promise<CharacteristicValue> {
        const state = this.activeState();
        this.log.debug(`GET Active: ${state}`);
        return state;
    }

    async handleActiveStateSet(value: CharacteristicValue): Promise<void> {
        this.log.debug(`SET Active to: ${String(value)}`);
        const heatStatus = value === this.platform.Characteristic.Active.ACTIVE ? HeatStatus.ON : HeatStatus.OFF;
        await this.write('setHeatStatus', fire => fire.setHeatSettings({heatStatus}));
    }

    async handleCurrentHeaterCoolerStateGet(): Promise<CharacteristicValue> {
        return this.currentHeaterCoolerState();
    }

    async handleTargetHeaterCoolerStateGet(): Promise<CharacteristicValue> {
        return this.platform.Characteristic.TargetHeaterCoolerState.HEAT;
    }

    async handleCurrentTemperatureGet(): Promise<CharacteristicValue> {
        const temperature = this.setpointCelsius();
        this.log.debug(`GET CurrentTemperature: ${temperature}`);
        return temperature;
    }

    async handleHeatingThresholdTemperatureGet(): Promise<CharacteristicValue> {
        const temperature = this.clampedSetpoint();
        this.log.debug(`GET HeatingThresholdTemperature: ${temperature}`);
        return temperature;
    }

    async handleHeatingThresholdTemperatureSet(value: CharacteristicValue): Promise<void> {
        const celsius = Number(value);
        const setpointTemperature = fromCelsius(celsius, this.fire.getTemperatureUnit());
        this.log.debug(`SET HeatingThresholdTemperature to: ${celsius} (fire value ${setpointTemperature})`);
        await this.write('setHeatTemperature', fire => fire.setHeatSettings({setpointTemperature}));
    }

    async handleTemperatureDisplayUnitsGet(): Promise<CharacteristicValue> {
        return this.displayUnits();
    }

    async handleTemperatureDisplayUnitsSet(value: CharacteristicValue): Promise<void> {
        this.log.debug(`SET TemperatureDisplayUnits to: ${String(value)}`);
        const unit = value === this.platform.Characteristic.TemperatureDisplayUnits.FAHRENHEIT
            ? TemperatureUnit.FAHRENHEIT
            : TemperatureUnit.CELSIUS;
        await this.write('setTemperatureUnit', fire => fire.setTemperatureUnit(unit));
    }

    private isHeatOn(): boolean {
        return this.fire.getParameter(ParameterKind.HEAT_SETTINGS)?.heatStatus === HeatStatus.ON;
    }

    private activeState(): number {
        const {Active} = this.platform.Characteristic;
        return this.isHeatOn() ? Active.ACTIVE : Active.INACTIVE;
    }

    private currentHeaterCoolerState(): number {
        const {CurrentHeaterCoolerState} = this.platform.Characteristic;
        if (!this.isHeatOn()) {
            return CurrentHeaterCoolerState.INACTIVE;
        }
        return this.fire.isOn() ? CurrentHeaterCoolerState.HEATING : CurrentHeaterCoolerState.IDLE;
    }

    private setpointCelsius(): number {
        const setpoint = this.fire.getParameter(ParameterKind.HEAT_SETTINGS)?.setpointTemperature;
        if (setpoint === undefined) {
            return DEFAULT_TARGET_TEMPERATURE;
        }
        return toCelsius(setpoint, this.fire.getTemperatureUnit());
    }

    private clampedSetpoint(): number {
        return Math.max(HOMEKIT_HEAT_TEMP_MIN, Math.min(HOMEKIT_HEAT_TEMP_MAX, this.setpointCelsius()));
    }

    /**
     * HomeKit numbers the units the other way round from the fire
     */
    private displayUnits(): number {
        const {TemperatureDisplayUnits} = this.platform.Characteristic;
        return this.fire.getTemperatureUnit() === TemperatureUnit.FAHRENHEIT
            ? TemperatureDisplayUnits.FAHRENHEIT
            : TemperatureDisplayUnits.CELSIUS;
    }
}
