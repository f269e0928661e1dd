import {CharacteristicValue, PlatformAccessory, Service} from 'homebridge';
import {FlameConnectAccessoryContext, FlameConnectPlatform} from '../platform';
import {BaseFireService} from './base-fire.service';

/**
 * Main power switch: on is manual mode, off is standby
 */
export class FireplaceService extends BaseFireService {
    private readonly service: Service;

    constructor(
        platform: FlameConnectPlatform,
        accessory: PlatformAccessory<FlameConnectAccessoryContext>,
    ) {
        super(platform, accessory);

        this.service = this.accessory.getServiceById(this.platform.Service.Switch, 'power')
            || this.accessory.addService(this.platform.Service.Switch, this.name, 'power');

        this.service.setCharacteristic(this.platform.Characteristic.Name, this.name);

        this.service.getCharacteristic(this.platform.Characteristic.On)
            .onGet(this.handlePowerGet.bind(this))
            .onSet(this.handlePowerSet.bind(this));
    }

    refresh(): void {
        this.service.updateCharacteristic(this.platform.Characteristic.On, this.fire.isOn());
    }

    async handlePowerGet(): Promise<CharacteristicValue> {
        const isOn = this.fire.isOn();
        this.log.debug(`GET Power: ${isOn}, last update: ${this.fire.getLastUpdated().toISOString()}`);
        return isOn;
    }

    async handlePowerSet(value: CharacteristicValue): Promise<void> {
        this.log.debug(`SET Power to: ${String(value)}`);
        await this.write('setPower', fire => (value ? fire.turnOn() : fire.turnOff()));
    }
}
