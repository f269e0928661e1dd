/**
 * Pulsating Effect Feature
 *
 * Makes the flame pulse.
 */

import {CharacteristicValue} from 'homebridge';
import {BaseFeature} from './base-feature';
import {FeatureToggles} from '../config/config-manager';
import {ParameterKind, PulsatingEffect} from '../types/flameconnect-enums';

export class PulsatingEffectFeature extends BaseFeature {
    get featureName(): string {
        return 'Pulsating effect';
    }

    get serviceSubtype(): string {
        return 'pulsating_effect';
    }

    get configKey(): keyof FeatureToggles {
        return 'pulsatingEffect';
    }

    isSupported(): boolean {
        return this.fire.hasParameter(ParameterKind.FLAME_EFFECT);
    }

    isActive(): boolean {
        return this.fire.getParameter(ParameterKind.FLAME_EFFECT)?.pulsatingEffect === PulsatingEffect.ON;
    }

    async handleSet(value: CharacteristicValue): Promise<void> {
        this.log.debug(`SET ${this.featureName} to: ${String(value)}`);
        const pulsatingEffect = value ? PulsatingEffect.ON : PulsatingEffect.OFF;
        await this.write('setPulsatingEffect', fire => fire.setFlameEffect({pulsatingEffect}));
    }
}
