/**
 * Base Feature
 *
 * Abstract base class for all feature modules.
 * Each feature is an optional switch like the pulsating effect or the timer.
 */

import {CharacteristicValue, PlatformAccessory, Service} from 'homebridge';
import {FlameConnectAccessoryContext, FlameConnectPlatform} from '../platform';
import {FeatureToggles} from '../config/config-manager';
import {BaseFireService} from '../services/base-fire.service';
import {LogCategory} from '../utils/log-context';

export abstract class BaseFeature extends BaseFireService {
    protected switchService?: Service;

    constructor(
        platform: FlameConnectPlatform,
        accessory: PlatformAccessory<FlameConnectAccessoryContext>,
    ) {
        super(platform, accessory);
    }

    /**
     * The display name for this feature (used for the switch service).
     */
    abstract get featureName(): string;

    /**
     * The unique identifier for this feature's switch service.
     */
    abstract get serviceSubtype(): string;

    /**
     * Config toggle that enables the switch
     */
    abstract get configKey(): keyof FeatureToggles;

    /**
     * Check if this feature is supported by the fire.
     */
    abstract isSupported(): boolean;

    /**
     * Current state of the feature, read from the cached parameters
     */
    abstract isActive(): boolean;

    /**
     * Set the state of the feature.
     */
    abstract handleSet(value: CharacteristicValue): Promise<void>;

    async handleGet(): Promise<CharacteristicValue> {
        const isOn = this.isActive();
        this.log.debug(`GET ${this.featureName}: ${isOn}`, {feature: this.featureName});
        return isOn;
    }

    isEnabled(): boolean {
        return this.platform.configManager.getFeatures()[this.configKey];
    }

    /**
     * Set up the feature. Creates or removes the switch service based on support and config.
     */
    setup(): void {
        if (this.isSupported() && this.isEnabled()) {
            this.log.debug(`Fire has ${this.featureName}, add Switch Service`, {category: LogCategory.FEATURE});
            this.createOrUpdateSwitchService();
        } else {
            this.removeServiceIfExists();
        }
    }

    refresh(): void {
        this.switchService?.updateCharacteristic(this.platform.Characteristic.On, this.isActive());
    }

    protected createOrUpdateSwitchService(): void {
        this.switchService = this.accessory.getServiceById(this.platform.Service.Switch, this.serviceSubtype) ||
            this.accessory.addService(
                this.platform.Service.Switch,
                this.featureName,
                this.serviceSubtype,
            );

        this.switchService.setCharacteristic(
            this.platform.Characteristic.Name,
            this.featureName,
        );

        this.switchService.addOptionalCharacteristic(
            this.platform.Characteristic.ConfiguredName,
        );
        this.switchService.setCharacteristic(
            this.platform.Characteristic.ConfiguredName,
            this.featureName,
        );

        this.switchService
            .getCharacteristic(this.platform.Characteristic.On)
            .onGet(this.handleGet.bind(this))
            .onSet(this.handleSet.bind(this));
    }

    protected removeServiceIfExists(): void {
        const existingService = this.accessory.getServiceById(this.platform.Service.Switch, this.serviceSubtype);
        if (existingService) {
            this.accessory.removeService(existingService);
        }
        this.switchService = undefined;
    }
}
