import {CharacteristicValue} from 'homebridge';
import {BaseFeature} from './base-feature';
import {FeatureToggles} from '../config/config-manager';
import {TimerStatus, ParameterKind} from '../types/flameconnect-enums';

/**
 * Countdown timer; switching on starts the configured duration
 */
export class TimerFeature extends BaseFeature {
    get featureName(): string {
        return 'Timer';
    }

    get serviceSubtype(): string {
        return 'timer';
    }

    get configKey(): keyof FeatureToggles {
        return 'timer';
    }

    isSupported(): boolean {
        return true;
    }

    isActive(): boolean {
        return this.fire.getParameter(ParameterKind.TIMER)?.timerStatus === TimerStatus.ENABLED;
    }

    async handleSet(value: CharacteristicValue): Promise<void> {
        const minutes = value ? this.platform.configManager.getTimerDurationMinutes() : 0;
        this.log.debug(`SET ${this.featureName} to: ${minutes} minutes`);
        await this.write('setTimer', fire => fire.setTimer(minutes));
    }
}
