/**
 * Fire Commands
 *
 * Builds the parameters a write needs from the fire's current state.
 * Partial updates always start from the current value so fields the
 * caller does not touch are written back unchanged.
 */

import {
    FlameEffectParameter,
    HeatSettingsParameter,
    isParameterOfKind,
    kindName,
    ModeParameter,
    Parameter,
    ParameterOf,
    TemperatureUnitParameter,
    TimerParameter,
    WritableParameter,
} from '../protocol';
import {
    FireMode,
    FlameEffectStatus,
    ParameterKind,
    TemperatureUnit,
    TimerStatus,
} from '../types/flameconnect-enums';
import {DEFAULT_TARGET_TEMPERATURE, FLAME_SPEED_MAX, FLAME_SPEED_MIN} from '../constants';

export class FireCommandError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FireCommandError';
    }
}

export type FlameEffectChanges = Partial<Omit<FlameEffectParameter, 'kind'>>;
export type HeatSettingsChanges = Partial<Omit<HeatSettingsParameter, 'kind'>>;

/** Largest value the 16-bit duration fields carry */
const MAX_DURATION_MINUTES = 0xFFFF;

export function findParameter<K extends ParameterKind>(
    parameters: readonly Parameter[],
    kind: K,
): ParameterOf<K> | undefined {
    for (const param of parameters) {
        if (isParameterOfKind(param, kind)) {
            return param;
        }
    }
    return undefined;
}

export function requireParameter<K extends ParameterKind>(parameters: readonly Parameter[], kind: K): ParameterOf<K> {
    const param = findParameter(parameters, kind);
    if (!param) {
        throw new FireCommandError(`No ${kindName(kind)} parameter found`);
    }
    return param;
}

/**
 * Target temperature of the current mode, or the default when the fire reported none
 */
export function currentTargetTemperature(parameters: readonly Parameter[]): number {
    return findParameter(parameters, ParameterKind.MODE)?.targetTemperature ?? DEFAULT_TARGET_TEMPERATURE;
}

export function modeParameter(parameters: readonly Parameter[], mode: FireMode): ModeParameter {
    return {
        kind: ParameterKind.MODE,
        mode,
        targetTemperature: currentTargetTemperature(parameters),
    };
}

/**
 * Manual mode at the current temperature, plus the flame switched on when the fire has one
 */
export function turnOnParameters(parameters: readonly Parameter[]): WritableParameter[] {
    const toWrite: WritableParameter[] = [modeParameter(parameters, FireMode.MANUAL)];
    const flame = findParameter(parameters, ParameterKind.FLAME_EFFECT);
    if (flame) {
        toWrite.push({...flame, flameEffect: FlameEffectStatus.ON});
    }
    return toWrite;
}

export function turnOffParameters(parameters: readonly Parameter[]): WritableParameter[] {
    return [modeParameter(parameters, FireMode.STANDBY)];
}

export function updateFlameEffect(parameters: readonly Parameter[], changes: FlameEffectChanges): FlameEffectParameter {
    if (changes.flameSpeed !== undefined
        && (!Number.isInteger(changes.flameSpeed) || changes.flameSpeed < FLAME_SPEED_MIN || changes.flameSpeed > FLAME_SPEED_MAX)) {
        throw new FireCommandError(`Flame speed must be between ${FLAME_SPEED_MIN} and ${FLAME_SPEED_MAX}`);
    }
    return {...requireParameter(parameters, ParameterKind.FLAME_EFFECT), ...changes};
}

export function updateHeatSettings(parameters: readonly Parameter[], changes: HeatSettingsChanges): HeatSettingsParameter {
    if (changes.boostDuration !== undefined && (changes.boostDuration < 0 || changes.boostDuration > MAX_DURATION_MINUTES)) {
        throw new FireCommandError(`Boost duration must be between 0 and ${MAX_DURATION_MINUTES} minutes`);
    }
    return {...requireParameter(parameters, ParameterKind.HEAT_SETTINGS), ...changes};
}

/**
 * Countdown timer; zero minutes disables it
 */
export function timerParameter(minutes: number): TimerParameter {
    if (!Number.isInteger(minutes) || minutes < 0 || minutes > MAX_DURATION_MINUTES) {
        throw new FireCommandError(`Timer must be between 0 and ${MAX_DURATION_MINUTES} minutes`);
    }
    return {
        kind: ParameterKind.TIMER,
        timerStatus: minutes > 0 ? TimerStatus.ENABLED : TimerStatus.DISABLED,
        duration: minutes,
    };
}

export function temperatureUnitParameter(unit: TemperatureUnit): TemperatureUnitParameter {
    return {kind: ParameterKind.TEMPERATURE_UNIT, unit};
}

/**
 * Replace parameters of the same kind, append the rest
 */
export function mergeParameters(current: readonly Parameter[], updates: readonly Parameter[]): Parameter[] {
    const merged = current.map(param => updates.find(update => update.kind === param.kind) ?? param);
    for (const update of updates) {
        if (!current.some(param => param.kind === update.kind)) {
            merged.push(update);
        }
    }
    return merged;
}
