/**
 * Parameter Encoders
 *
 * Every writer emits the kind's full fixed-length frame: header, fields,
 * and zero bytes wherever the fire expects padding.
 */

import {ParameterKind} from '../types/flameconnect-enums';
import {
    FlameEffectParameter,
    HeatModeParameter,
    HeatSettingsParameter,
    LogEffectParameter,
    ModeParameter,
    Parameter,
    SoundParameter,
    TemperatureUnitParameter,
    TimerParameter,
} from './parameter-types';
import {fail, ok, ProtocolResult, readOnlyParameter, unknownParameter} from './protocol-error';
import {allocateFrame, PULSATING_BIT, writeColor, writeTemperature, writeUInt16LE} from './wire';

export function encodeTemperatureUnit(param: TemperatureUnitParameter): Buffer {
    const frame = allocateFrame(ParameterKind.TEMPERATURE_UNIT);
    frame[3] = param.unit;
    return frame;
}

export function encodeMode(param: ModeParameter): Buffer {
    const frame = allocateFrame(ParameterKind.MODE);
    frame[3] = param.mode;
    writeTemperature(frame, 4, param.targetTemperature);
    return frame;
}

export function encodeFlameEffect(param: FlameEffectParameter): Buffer {
    const frame = allocateFrame(ParameterKind.FLAME_EFFECT);
    frame[3] = param.flameEffect;
    frame[4] = Math.max(0, param.flameSpeed - 1);
    frame[5] = (param.brightness & ~PULSATING_BIT) | ((param.pulsatingEffect << 1) & PULSATING_BIT);
    frame[6] = param.mediaTheme;
    frame[7] = param.mediaLight;
    writeColor(frame, 8, param.mediaColor);
    frame[13] = param.overheadLight;
    writeColor(frame, 14, param.overheadColor);
    frame[18] = param.lightStatus;
    frame[19] = param.flameColor;
    frame[22] = param.ambientSensor;
    return frame;
}

export function encodeHeatSettings(param: HeatSettingsParameter): Buffer {
    const frame = allocateFrame(ParameterKind.HEAT_SETTINGS);
    frame[3] = param.heatStatus;
    frame[4] = param.heatMode;
    writeTemperature(frame, 5, param.setpointTemperature);
    writeUInt16LE(frame, 7, param.boostDuration);
    return frame;
}

export function encodeHeatMode(param: HeatModeParameter): Buffer {
    const frame = allocateFrame(ParameterKind.HEAT_MODE);
    frame[3] = param.heatControl;
    return frame;
}

export function encodeTimer(param: TimerParameter): Buffer {
    const frame = allocateFrame(ParameterKind.TIMER);
    frame[3] = param.timerStatus;
    writeUInt16LE(frame, 4, param.duration);
    return frame;
}

export function encodeSound(param: SoundParameter): Buffer {
    const frame = allocateFrame(ParameterKind.SOUND);
    frame[3] = param.volume;
    frame[4] = param.soundFile;
    return frame;
}

export function encodeLogEffect(param: LogEffectParameter): Buffer {
    const frame = allocateFrame(ParameterKind.LOG_EFFECT);
    frame[3] = param.logEffect;
    writeColor(frame, 5, param.color);
    frame[9] = param.pattern;
    return frame;
}

/**
 * Encode a parameter into its wire frame.
 * Read-only kinds (software version, error) are rejected.
 */
export function encodeParameter(param: Parameter): ProtocolResult<Buffer> {
    switch (param.kind) {
        case ParameterKind.TEMPERATURE_UNIT:
            return ok(encodeTemperatureUnit(param));
        case ParameterKind.MODE:
            return ok(encodeMode(param));
        case ParameterKind.FLAME_EFFECT:
            return ok(encodeFlameEffect(param));
        case ParameterKind.HEAT_SETTINGS:
            return ok(encodeHeatSettings(param));
        case ParameterKind.HEAT_MODE:
            return ok(encodeHeatMode(param));
        case ParameterKind.TIMER:
            return ok(encodeTimer(param));
        case ParameterKind.SOUND:
            return ok(encodeSound(param));
        case ParameterKind.LOG_EFFECT:
            return ok(encodeLogEffect(param));
        case ParameterKind.SOFTWARE_VERSION:
        case ParameterKind.ERROR:
            return fail(readOnlyParameter(param.kind));
        default:
            return fail(unknownParameter(unhandledKind(param)));
    }
}

/** Tag of a value built outside the type system, e.g. from parsed JSON */
function unhandledKind(param: never): number {
    const value: unknown = param;
    if (typeof value === 'object' && value !== null && 'kind' in value && typeof value.kind === 'number') {
        return value.kind;
    }
    return -1;
}

/**
 * Encode a batch; the first failure aborts and is returned
 */
export function encodeParameters(params: readonly Parameter[]): ProtocolResult<Buffer[]> {
    const frames: Buffer[] = [];
    for (const param of params) {
        const result = encodeParameter(param);
        if (!result.success) {
            return fail(result.error);
        }
        frames.push(result.data);
    }
    return ok(frames);
}
