import type { PlatformAccessory, Service } from 'homebridge';
import type { FlameConnectAccessoryContext, FlameConnectPlatform } from '../platform';
import type { FlameConnectFire } from '../api';
import { ParameterKind } from '../types/flameconnect-enums';
import { createFireLogger, type StructuredLogger } from '../utils/log-context';
import { CONNECTION_STATE_NAMES, describeParameter, displayName } from '../protocol';

const DEFAULT_MANUFACTURER = 'Flame Connect';

export class BaseAccessory {
  readonly platform: FlameConnectPlatform;
  readonly accessory: PlatformAccessory<FlameConnectAccessoryContext>;
  protected readonly log: StructuredLogger;

  constructor(
    platform: FlameConnectPlatform,
    accessory: PlatformAccessory<FlameConnectAccessoryContext>,
  ) {
    this.platform = platform;
    this.accessory = accessory;
    this.log = createFireLogger(platform.log, this.fire.getId(), accessory.displayName);

    const fire = this.fire.getFire();
    this.printFireInfo();

    this.informationService()
      .setCharacteristic(this.platform.Characteristic.Manufacturer, fire.brand || DEFAULT_MANUFACTURER)
      .setCharacteristic(this.platform.Characteristic.Model, fire.productModel || fire.productType || 'Unknown')
      .setCharacteristic(this.platform.Characteristic.SerialNumber, fire.fireId)
      .setCharacteristic(this.platform.Characteristic.FirmwareRevision, this.firmwareRevision());

    const updateListener = () => {
      this.log.debug(`Updated, LastUpdated: ${this.fire.getLastUpdated().toISOString()}`, { operation: 'sync' });
      this.refreshCharacteristics();
    };
    this.fire.on('updated', updateListener);
    this.platform.registerFireListener(this.accessory, updateListener);
  }

  get fire(): FlameConnectFire {
    return this.accessory.context.fire;
  }

  /**
     * Push the cached fire state to HomeKit; subclasses override
     */
  protected refreshCharacteristics(): void {}

  /**
     * Control board version, e.g. "1.2.3"; "0.0.0" when the fire did not report one
     */
  firmwareRevision(): string {
    const version = this.fire.getParameter(ParameterKind.SOFTWARE_VERSION);
    if (!version) {
      return '0.0.0';
    }
    return `${version.controlMajor}.${version.controlMinor}.${version.controlTest}`;
  }

  private informationService(): Service {
    return this.accessory.getService(this.platform.Service.AccessoryInformation)
      ?? this.accessory.addService(this.platform.Service.AccessoryInformation);
  }

  private printFireInfo() {
    const fire = this.fire.getFire();
    this.log.info(`Fire found with id: ${this.accessory.UUID}`);
    this.log.info(`    name: ${this.accessory.displayName}`);
    this.log.info(`    brand: ${fire.brand || 'unknown'}, model: ${fire.productModel || 'unknown'}`);
    this.log.info(`    heater: ${fire.withHeat ? 'yes' : 'no'}, connection: ${displayName(CONNECTION_STATE_NAMES, fire.connectionState)}`);
    this.log.debug(`    parameters: ${this.fire.getParameters().length}, last updated: ${this.fire.getLastUpdated().toISOString()}`);
    for (const param of this.fire.getParameters()) {
      this.log.debug(`    ${describeParameter(param)}`);
    }
  }
}
