/**
 * Boost Mode Feature
 *
 * Runs the heater at full power for the boost duration.
 * Switching it off returns the heater to normal mode.
 */

import {CharacteristicValue} from 'homebridge';
import {BaseFeature} from './base-feature';
import {FeatureToggles} from '../config/config-manager';
import {HeatMode, HeatStatus, ParameterKind} from '../types/flameconnect-enums';
import {DEFAULT_BOOST_DURATION_MINUTES} from '../constants';

export class BoostModeFeature extends BaseFeature {
    get featureName(): string {
        return 'Boost mode';
    }

    get serviceSubtype(): string {
        return 'boost_mode';
    }

    get configKey(): keyof FeatureToggles {
        return 'boostMode';
    }

    isSupported(): boolean {
        return this.fire.getFire().withHeat && this.fire.hasParameter(ParameterKind.HEAT_SETTINGS);
    }

    isActive(): boolean {
        const heat = this.fire.getParameter(ParameterKind.HEAT_SETTINGS);
        return heat?.heatStatus === HeatStatus.ON && heat.heatMode === HeatMode.BOOST;
    }

    async handleSet(value: CharacteristicValue): Promise<void> {
        this.log.debug(`SET ${this.featureName} to: ${String(value)}`);
        if (!value) {
            await this.write('setBoostMode', fire => fire.setHeatSettings({heatMode: HeatMode.NORMAL}));
            return;
        }

        const current = this.fire.getParameter(ParameterKind.HEAT_SETTINGS)?.boostDuration ?? 0;
        const boostDuration = current > 0 ? current : DEFAULT_BOOST_DURATION_MINUTES;
        await this.write('setBoostMode', fire => fire.setHeatSettings({
            heatStatus: HeatStatus.ON,
            heatMode: HeatMode.BOOST,
            boostDuration,
        }));
    }
}
