import {CharacteristicValue} from 'homebridge';
import {BaseFeature} from './base-feature';
import {FeatureToggles} from '../config/config-manager';
import {LightStatus, ParameterKind} from '../types/flameconnect-enums';

/**
 * Fuel bed (media) light
 */
export class MediaLightFeature extends BaseFeature {
    get featureName(): string {
        return 'Media light';
    }

    get serviceSubtype(): string {
        return 'media_light';
    }

    get configKey(): keyof FeatureToggles {
        return 'mediaLight';
    }

    isSupported(): boolean {
        return this.fire.hasParameter(ParameterKind.FLAME_EFFECT);
    }

    isActive(): boolean {
        return this.fire.getParameter(ParameterKind.FLAME_EFFECT)?.mediaLight === LightStatus.ON;
    }

    async handleSet(value: CharacteristicValue): Promise<void> {
        this.log.debug(`SET ${this.featureName} to: ${String(value)}`);
        const mediaLight = value ? LightStatus.ON : LightStatus.OFF;
        await this.write('setMediaLight', fire => fire.setFlameEffect({mediaLight}));
    }
}
