import {CharacteristicValue} from 'homebridge';
import {BaseFeature} from './base-feature';
import {FeatureToggles} from '../config/config-manager';
import {LightStatus, ParameterKind} from '../types/flameconnect-enums';

export class OverheadLightFeature extends BaseFeature {
    get featureName(): string {
        return 'Overhead light';
    }

    get serviceSubtype(): string {
        return 'overhead_light';
    }

    get configKey(): keyof FeatureToggles {
        return 'overheadLight';
    }

    isSupported(): boolean {
        return this.fire.hasParameter(ParameterKind.FLAME_EFFECT);
    }

    isActive(): boolean {
        return this.fire.getParameter(ParameterKind.FLAME_EFFECT)?.overheadLight === LightStatus.ON;
    }

    async handleSet(value: CharacteristicValue): Promise<void> {
        this.log.debug(`SET ${this.featureName} to: ${String(value)}`);
        const overheadLight = value ? LightStatus.ON : LightStatus.OFF;
        await this.write('setOverheadLight', fire => fire.setFlameEffect({overheadLight}));
    }
}
