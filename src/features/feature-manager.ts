/**
 * Feature Manager
 *
 * Orchestrates the setup of all feature modules for an accessory.
 */

import {PlatformAccessory} from 'homebridge';
import {FlameConnectAccessoryContext, FlameConnectPlatform} from '../platform';
import {BaseFeature} from './base-feature';

import {PulsatingEffectFeature} from './pulsating-effect.feature';
import {MediaLightFeature} from './media-light.feature';
import {OverheadLightFeature} from './overhead-light.feature';
import {BoostModeFeature} from './boost-mode.feature';
import {TimerFeature} from './timer.feature';

type FeatureConstructor = new (
    platform: FlameConnectPlatform,
    accessory: PlatformAccessory<FlameConnectAccessoryContext>,
) => BaseFeature;

const FEATURE_CLASSES: FeatureConstructor[] = [
    PulsatingEffectFeature,
    MediaLightFeature,
    OverheadLightFeature,
    BoostModeFeature,
    TimerFeature,
];

export class FeatureManager {
    private readonly features: BaseFeature[];

    constructor(
        platform: FlameConnectPlatform,
        accessory: PlatformAccessory<FlameConnectAccessoryContext>,
    ) {
        this.features = FEATURE_CLASSES.map(FeatureClass => new FeatureClass(platform, accessory));
    }

    /**
     * Set up all features. Each feature will create or remove its switch service
     * based on fire support and configuration.
     */
    setupFeatures(): void {
        for (const feature of this.features) {
            feature.setup();
        }
    }

    refreshFeatures(): void {
        for (const feature of this.features) {
            feature.refresh();
        }
    }

    getFeature<T extends BaseFeature>(featureClass: abstract new (...args: never[]) => T): T | undefined {
        for (const feature of this.features) {
            if (feature instanceof featureClass) {
                return feature;
            }
        }
        return undefined;
    }

    /**
     * Features with a switch on this accessory
     */
    getActiveFeatures(): BaseFeature[] {
        return this.features.filter(f => f.isSupported() && f.isEnabled());
    }

    getAllFeatures(): BaseFeature[] {
        return [...this.features];
    }
}
