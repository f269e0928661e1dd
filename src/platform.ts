import {API, Characteristic, DynamicPlatformPlugin, Logger, PlatformAccessory, PlatformConfig, Service} from 'homebridge';

import {PLATFORM_NAME, PLUGIN_NAME} from './settings';
import {FireplaceAccessory} from './accessories';

import {resolve} from 'node:path';

import {FireRepository, FlameConnectController, FlameConnectFire, SkippedParameter} from './api';
import {ConfigManager, PluginConfig} from './config/config-manager';
import {createCategoryLogger, LogCategory, StructuredLogger} from './utils/log-context';
import {ErrorHandler, toError} from './utils/error-handler';
import {ONE_MINUTE_MS} from './constants';

export type FlameConnectAccessoryContext = {
    fire: FlameConnectFire;
};

const TOKEN_FILE_NAME = '.flameconnect-tokenset';

export class FlameConnectPlatform implements DynamicPlatformPlugin {
    public readonly Service: typeof Service;
    public readonly Characteristic: typeof Characteristic;

    public readonly accessories: PlatformAccessory<FlameConnectAccessoryContext>[] = [];

    public readonly storagePath: string;
    public readonly configManager: ConfigManager;
    public readonly errorHandler: ErrorHandler;
    public controller: FlameConnectController | undefined;

    public readonly updateIntervalDelay: number;
    private updateInterval: NodeJS.Timeout | undefined;
    private forceUpdateTimeout: NodeJS.Timeout | undefined;
    private readonly platformLog: StructuredLogger;
    private readonly fireListeners = new Map<string, () => void>();

    constructor(
        public readonly log: Logger,
        public readonly config: PlatformConfig,
        public readonly api: API,
    ) {
        this.platformLog = createCategoryLogger(this.log, LogCategory.PLATFORM);
        this.errorHandler = new ErrorHandler(this.log, 'FlameConnect');
        this.platformLog.debug(`Initializing platform: ${this.config.name ?? PLATFORM_NAME}`);

        this.Service = this.api.hap.Service;
        this.Characteristic = this.api.hap.Characteristic;
        this.storagePath = api.user.storagePath();
        this.configManager = new ConfigManager(toPluginConfig(this.config));
        this.updateIntervalDelay = this.configManager.getUpdateIntervalMs();

        const configLog = createCategoryLogger(this.log, LogCategory.CONFIG);
        const validation = this.configManager.validate();
        for (const warning of validation.warnings) {
            configLog.warn(warning);
        }

        const credentials = this.configManager.getCredentials();
        if (!validation.valid || !credentials) {
            for (const error of validation.errors) {
                configLog.error(error);
            }
            configLog.warn('Please configure the plugin using the Homebridge UI.');
            return;
        }

        const tokenFilePath = resolve(this.storagePath, TOKEN_FILE_NAME);
        configLog.debug('Homebridge config', {metadata: this.getPrivacyFriendlyConfig()});

        this.controller = new FlameConnectController({...credentials, tokenFilePath});

        this.api.on('didFinishLaunching', () => {
            this.launch().catch((error: unknown) => {
                this.errorHandler.handle(toError(error), {operation: 'launch'});
            });
        });

        this.api.on('shutdown', () => {
            this.platformLog.debug('Shutting down, cleaning up resources...');
            clearInterval(this.updateInterval);
            clearTimeout(this.forceUpdateTimeout);
            for (const [uuid, listener] of this.fireListeners) {
                const accessory = this.accessories.find(a => a.UUID === uuid);
                accessory?.context.fire.removeListener('updated', listener);
            }
            this.fireListeners.clear();
        });
    }

    public configureAccessory(accessory: PlatformAccessory<FlameConnectAccessoryContext>) {
        this.platformLog.info(`Loading accessory from cache: ${accessory.displayName}`);
        this.accessories.push(accessory);
    }

    /**
     * Sign in when needed, then discover fires and start polling
     */
    async launch(): Promise<void> {
        const controller = this.controller;
        if (!controller) {
            return;
        }

        controller.on('error', (message: string) => {
            this.platformLog.error(message);
        });
        controller.on('token_update', () => {
            createCategoryLogger(this.log, LogCategory.AUTH).debug('Token updated');
        });
        controller.on('parameter_skipped', (skipped: SkippedParameter) => {
            createCategoryLogger(this.log, LogCategory.PROTOCOL).warn(`Skipped parameter: ${skipped.reason}`, {
                fireId: skipped.fireId,
                parameter: String(skipped.parameterId),
            });
        });

        if (!controller.isAuthenticated()) {
            const authLog = createCategoryLogger(this.log, LogCategory.AUTH);
            authLog.info('Signing in to Flame Connect...');
            try {
                await controller.authenticate();
                authLog.info('Authentication successful!');
            } catch (error) {
                this.errorHandler.handle(toError(error), {operation: 'authenticate'});
                return;
            }
        }

        const fires = await this.discoverFires(controller);
        if (fires.length > 0) {
            this.createFires(fires);
            this.startUpdateFiresInterval();
        }
    }

    private async discoverFires(controller: FlameConnectController): Promise<FlameConnectFire[]> {
        try {
            return await controller.getCloudFires();
        } catch (error) {
            this.errorHandler.handle(toError(error), {operation: 'discoverFires'});
            return [];
        }
    }

    private createFires(fires: FlameConnectFire[]) {
        for (const fire of fires) {
            const uuid = this.api.hap.uuid.generate(fire.getId());
            const existingAccessory = this.accessories.find(accessory => accessory.UUID === uuid);

            this.platformLog.debug('Create fire', {
                metadata: {fire: FireRepository.maskSensitiveFireData(fire.getFire())},
            });

            if (this.configManager.isFireExcluded(fire.getId())) {
                this.platformLog.info(`Fire with id ${FireRepository.maskId(fire.getId())} is excluded, don't add accessory`);
                if (existingAccessory) {
                    this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [existingAccessory]);
                }
                continue;
            }

            try {
                if (existingAccessory) {
                    this.platformLog.info(`Restoring existing accessory from cache: ${existingAccessory.displayName}`);

                    this.removeFireListener(existingAccessory);
                    existingAccessory.context.fire = fire;
                    this.api.updatePlatformAccessories([existingAccessory]);

                    new FireplaceAccessory(this, existingAccessory);
                } else {
                    this.platformLog.info(`Adding new accessory: ${fire.getName()}`);
                    const accessory = new this.api.platformAccessory<FlameConnectAccessoryContext>(fire.getName(), uuid);
                    accessory.context.fire = fire;

                    new FireplaceAccessory(this, accessory);

                    this.accessories.push(accessory);
                    this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
                }
            } catch (error) {
                this.errorHandler.handle(toError(error), {operation: 'createAccessory', fireId: fire.getId()});
            }
        }
    }

    private removeFireListener(accessory: PlatformAccessory<FlameConnectAccessoryContext>) {
        const existingListener = this.fireListeners.get(accessory.UUID);
        if (existingListener) {
            accessory.context.fire.removeListener('updated', existingListener);
            this.fireListeners.delete(accessory.UUID);
        }
    }

    registerFireListener(accessory: PlatformAccessory<FlameConnectAccessoryContext>, listener: () => void) {
        this.fireListeners.set(accessory.UUID, listener);
    }

    private async updateFires() {
        if (!this.controller) {
            return;
        }
        if (this.controller.isRateLimited()) {
            this.platformLog.debug(`Rate limited, skipping update for ${this.controller.getRateLimitRetryAfter()}s`);
            return;
        }
        try {
            await this.controller.updateAllFireData();
        } catch (error) {
            this.errorHandler.handle(toError(error), {operation: 'updateFires'});
        }
    }

    /**
     * Re-read all fires shortly after a write; repeated calls while one is pending are ignored
     */
    forceUpdateFires(delay: number = Math.max(0, this.configManager.getForceUpdateDelayMs())) {
        if (this.forceUpdateTimeout) {
            this.platformLog.debug('Force update already pending, skipping duplicate request');
            return;
        }

        this.platformLog.debug(`Force update fires data (delayed by ${delay}ms)`);

        clearInterval(this.updateInterval);

        this.forceUpdateTimeout = setTimeout(() => {
            this.forceUpdateTimeout = undefined;
            void this.updateFires().then(() => this.startUpdateFiresInterval());
        }, delay);
    }

    private startUpdateFiresInterval() {
        this.platformLog.debug(`(Re)starting update fires interval every ${this.updateIntervalDelay / ONE_MINUTE_MS} minutes`);
        clearInterval(this.updateInterval);
        this.updateInterval = setInterval(() => {
            void this.updateFires();
        }, this.updateIntervalDelay);
    }

    private getPrivacyFriendlyConfig(): Record<string, unknown> {
        const raw = this.configManager.getRawConfig();
        return {
            ...raw,
            email: raw.email ? FireRepository.maskId(raw.email) : undefined,
            password: raw.password ? '***' : undefined,
            excludedFiresByFireId: (raw.excludedFiresByFireId ?? []).map(fireId => FireRepository.maskId(fireId)),
        };
    }
}

function optionalString(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
    return typeof value === 'number' ? value : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
    return typeof value === 'boolean' ? value : undefined;
}

/**
 * Typed view of the Homebridge config; values of the wrong type are treated as unset
 */
export function toPluginConfig(config: PlatformConfig): PluginConfig {
    const excluded: unknown = config.excludedFiresByFireId;
    return {
        platform: config.platform,
        name: config.name,
        email: optionalString(config.email),
        password: optionalString(config.password),
        updateIntervalInMinutes: optionalNumber(config.updateIntervalInMinutes),
        forceUpdateDelay: optionalNumber(config.forceUpdateDelay),
        excludedFiresByFireId: Array.isArray(excluded)
            ? excluded.filter((id): id is string => typeof id === 'string')
            : undefined,
        showPulsatingEffect: optionalBoolean(config.showPulsatingEffect),
        showMediaLight: optionalBoolean(config.showMediaLight),
        showOverheadLight: optionalBoolean(config.showOverheadLight),
        showBoostMode: optionalBoolean(config.showBoostMode),
        showTimer: optionalBoolean(config.showTimer),
        showExtraFeatures: optionalBoolean(config.showExtraFeatures),
        timerDurationMinutes: optionalNumber(config.timerDurationMinutes),
    };
}
