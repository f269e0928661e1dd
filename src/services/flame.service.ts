import {CharacteristicValue, PlatformAccessory, Service} from 'homebridge';
import {FlameConnectAccessoryContext, FlameConnectPlatform} from '../platform';
import {BaseFireService} from './base-fire.service';
import {FlameEffectStatus, ParameterKind} from '../types/flameconnect-enums';
import {FLAME_SPEED_MAX, FLAME_SPEED_MIN, FLAME_SPEED_TO_PERCENTAGE_MULTIPLIER} from '../constants';

/**
 * Brightness in percent for a flame speed of 1-5
 */
export function flameSpeedToBrightness(speed: number): number {
    return speed * FLAME_SPEED_TO_PERCENTAGE_MULTIPLIER;
}

/**
 * Nearest flame speed for a brightness; never below the slowest speed
 */
export function brightnessToFlameSpeed(brightness: number): number {
    const speed = Math.round(brightness / FLAME_SPEED_TO_PERCENTAGE_MULTIPLIER);
    return Math.min(FLAME_SPEED_MAX, Math.max(FLAME_SPEED_MIN, speed));
}

/**
 * Flame effect as a dimmable light; brightness drives the flame speed
 */
export class FlameService extends BaseFireService {
    private readonly service: Service;

    constructor(
        platform: FlameConnectPlatform,
        accessory: PlatformAccessory<FlameConnectAccessoryContext>,
    ) {
        super(platform, accessory);

        const serviceName = `${this.name} Flame`;
        this.service = this.accessory.getServiceById(this.platform.Service.Lightbulb, 'flame')
            || this.accessory.addService(this.platform.Service.Lightbulb, serviceName, 'flame');

        this.service.setCharacteristic(this.platform.Characteristic.Name, serviceName);

        this.service.getCharacteristic(this.platform.Characteristic.On)
            .onGet(this.handleFlameGet.bind(this))
            .onSet(this.handleFlameSet.bind(this));

        this.service.getCharacteristic(this.platform.Characteristic.Brightness)
            .setProps({
                minValue: 0,
                maxValue: 100,
                minStep: FLAME_SPEED_TO_PERCENTAGE_MULTIPLIER,
            })
            .onGet(this.handleBrightnessGet.bind(this))
            .onSet(this.handleBrightnessSet.bind(this));
    }

    refresh(): void {
        this.service.updateCharacteristic(this.platform.Characteristic.On, this.isFlameOn());
        this.service.updateCharacteristic(this.platform.Characteristic.Brightness, this.brightness());
    }

    async handleFlameGet(): Promise<CharacteristicValue> {
        const isOn = this.isFlameOn();
        this.log.debug(`GET Flame: ${isOn}`);
        return isOn;
    }

    async handleFlameSet(value: CharacteristicValue): Promise<void> {
        this.log.debug(`SET Flame to: ${String(value)}`);
        const flameEffect = value ? FlameEffectStatus.ON : FlameEffectStatus.OFF;
        await this.write('setFlameEffect', fire => fire.setFlameEffect({flameEffect}));
    }

    async handleBrightnessGet(): Promise<CharacteristicValue> {
        const brightness = this.brightness();
        this.log.debug(`GET Brightness: ${brightness}`);
        return brightness;
    }

    async handleBrightnessSet(value: CharacteristicValue): Promise<void> {
        const brightness = Number(value);
        this.log.debug(`SET Brightness to: ${brightness}`);

        if (brightness <= 0) {
            await this.write('setFlameEffect', fire => fire.setFlameEffect({flameEffect: FlameEffectStatus.OFF}));
            return;
        }

        const flameSpeed = brightnessToFlameSpeed(brightness);
        await this.write('setFlameSpeed', fire => fire.setFlameEffect({flameEffect: FlameEffectStatus.ON, flameSpeed}));
    }

    private isFlameOn(): boolean {
        return this.fire.isOn() && this.fire.getParameter(ParameterKind.FLAME_EFFECT)?.flameEffect === FlameEffectStatus.ON;
    }

    private brightness(): number {
        const flame = this.fire.getParameter(ParameterKind.FLAME_EFFECT);
        return flame ? flameSpeedToBrightness(flame.flameSpeed) : 0;
    }
}
