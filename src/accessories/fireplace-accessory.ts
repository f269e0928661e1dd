import type { PlatformAccessory } from 'homebridge';
import type { FlameConnectAccessoryContext, FlameConnectPlatform } from '../platform';
import { BaseAccessory } from './base-accessory';
import { FireplaceService, FlameService, HeaterService } from '../services';
import { FeatureManager } from '../features';
import { ParameterKind } from '../types/flameconnect-enums';

export class FireplaceAccessory extends BaseAccessory {
  readonly fireplaceService: FireplaceService;
  readonly flameService: FlameService;
  readonly heaterService?: HeaterService;
  readonly featureManager: FeatureManager;

  constructor(
    platform: FlameConnectPlatform,
    accessory: PlatformAccessory<FlameConnectAccessoryContext>,
  ) {
    super(platform, accessory);

    this.fireplaceService = new FireplaceService(this.platform, this.accessory);
    this.flameService = new FlameService(this.platform, this.accessory);

    if (this.hasHeater()) {
      this.heaterService = new HeaterService(this.platform, this.accessory);
    } else {
      const staleHeater = this.accessory.getService(this.platform.Service.HeaterCooler);
      if (staleHeater) {
        this.accessory.removeService(staleHeater);
      }
    }

    // Optional switches (pulsating effect, lights, boost, timer)
    this.featureManager = new FeatureManager(this.platform, this.accessory);
    this.featureManager.setupFeatures();
  }

  hasHeater(): boolean {
    return this.fire.getFire().withHeat && this.fire.hasParameter(ParameterKind.HEAT_SETTINGS);
  }

  protected refreshCharacteristics(): void {
    this.fireplaceService.refresh();
    this.flameService.refresh();
    this.heaterService?.refresh();
    this.featureManager.refreshFeatures();
  }
}
