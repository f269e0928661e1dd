/**
 * Base Fire Service
 *
 * Shared plumbing for the HomeKit services of a fireplace: access to the
 * cached fire, per-fire logging and the write-then-resync sequence.
 */

import type {PlatformAccessory} from 'homebridge';
import type {FlameConnectAccessoryContext, FlameConnectPlatform} from '../platform';
import type {FlameConnectFire} from '../api';
import {createFireLogger, LogCategory, StructuredLogger} from '../utils/log-context';
import {toError} from '../utils/error-handler';

export abstract class BaseFireService {
    readonly platform: FlameConnectPlatform;
    readonly accessory: PlatformAccessory<FlameConnectAccessoryContext>;

    protected readonly name: string;
    protected readonly log: StructuredLogger;

    constructor(
        platform: FlameConnectPlatform,
        accessory: PlatformAccessory<FlameConnectAccessoryContext>,
    ) {
        this.platform = platform;
        this.accessory = accessory;
        this.name = accessory.displayName;
        this.log = createFireLogger(platform.log, this.fire.getId(), this.name).child({category: LogCategory.SERVICE});
    }

    get fire(): FlameConnectFire {
        return this.accessory.context.fire;
    }

    /**
     * Push the cached state to HomeKit after a sync
     */
    abstract refresh(): void;

    /**
     * Run a write against the fire, then schedule a resync.
     * Failures are reported and rethrown so HomeKit shows the error.
     */
    protected async write(operation: string, action: (fire: FlameConnectFire) => Promise<void>): Promise<void> {
        try {
            await action(this.fire);
            this.platform.forceUpdateFires();
        } catch (error) {
            this.platform.errorHandler.handle(toError(error), {operation, fireId: this.fire.getId()});
            throw error;
        }
    }
}
