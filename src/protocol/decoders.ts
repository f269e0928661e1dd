/**
 * Parameter Decoders
 *
 * One reader per parameter kind. Each validates the frame length before
 * touching any field; enum bytes outside the known values pass through.
 */

import {ParameterKind} from '../types/flameconnect-enums';
import {
    ErrorParameter,
    FlameEffectParameter,
    HeatModeParameter,
    HeatSettingsParameter,
    isParameterKind,
    LogEffectParameter,
    ModeParameter,
    Parameter,
    ParameterOf,
    SoftwareVersionParameter,
    SoundParameter,
    TemperatureUnitParameter,
    TimerParameter,
} from './parameter-types';
import {fail, ok, ProtocolResult, unknownParameter} from './protocol-error';
import {checkLength, PULSATING_BIT, readColor, readTemperature, readUInt16LE} from './wire';

type Decoder<K extends ParameterKind> = (raw: Uint8Array) => ProtocolResult<ParameterOf<K>>;

/**
 * Wrap a field reader with the kind's length check
 */
function decoder<K extends ParameterKind>(
    kind: K,
    read: (raw: Uint8Array) => ParameterOf<K>,
): Decoder<K> {
    return (raw) => {
        const lengthError = checkLength(kind, raw);
        return lengthError ? fail<ParameterOf<K>>(lengthError) : ok(read(raw));
    };
}

export const decodeTemperatureUnit = decoder(ParameterKind.TEMPERATURE_UNIT, (raw): TemperatureUnitParameter => ({
    kind: ParameterKind.TEMPERATURE_UNIT,
    unit: raw[3],
}));

export const decodeMode = decoder(ParameterKind.MODE, (raw): ModeParameter => ({
    kind: ParameterKind.MODE,
    mode: raw[3],
    targetTemperature: readTemperature(raw, 4),
}));

export const decodeFlameEffect = decoder(ParameterKind.FLAME_EFFECT, (raw): FlameEffectParameter => ({
    kind: ParameterKind.FLAME_EFFECT,
    flameEffect: raw[3],
    flameSpeed: raw[4] + 1,
    brightness: raw[5] & ~PULSATING_BIT,
    pulsatingEffect: (raw[5] & PULSATING_BIT) >> 1,
    mediaTheme: raw[6],
    mediaLight: raw[7],
    mediaColor: readColor(raw, 8),
    // 12: padding
    overheadLight: raw[13],
    overheadColor: readColor(raw, 14),
    lightStatus: raw[18],
    flameColor: raw[19],
    // 20-21: padding
    ambientSensor: raw[22],
}));

export const decodeHeatSettings = decoder(ParameterKind.HEAT_SETTINGS, (raw): HeatSettingsParameter => ({
    kind: ParameterKind.HEAT_SETTINGS,
    heatStatus: raw[3],
    heatMode: raw[4],
    setpointTemperature: readTemperature(raw, 5),
    boostDuration: readUInt16LE(raw, 7),
}));

export const decodeHeatMode = decoder(ParameterKind.HEAT_MODE, (raw): HeatModeParameter => ({
    kind: ParameterKind.HEAT_MODE,
    heatControl: raw[3],
}));

export const decodeTimer = decoder(ParameterKind.TIMER, (raw): TimerParameter => ({
    kind: ParameterKind.TIMER,
    timerStatus: raw[3],
    duration: readUInt16LE(raw, 4),
}));

export const decodeSoftwareVersion = decoder(ParameterKind.SOFTWARE_VERSION, (raw): SoftwareVersionParameter => ({
    kind: ParameterKind.SOFTWARE_VERSION,
    uiMajor: raw[3],
    uiMinor: raw[4],
    uiTest: raw[5],
    controlMajor: raw[6],
    controlMinor: raw[7],
    controlTest: raw[8],
    relayMajor: raw[9],
    relayMinor: raw[10],
    relayTest: raw[11],
}));

export const decodeError = decoder(ParameterKind.ERROR, (raw): ErrorParameter => ({
    kind: ParameterKind.ERROR,
    errorByte1: raw[3],
    errorByte2: raw[4],
    errorByte3: raw[5],
    errorByte4: raw[6],
}));

export const decodeSound = decoder(ParameterKind.SOUND, (raw): SoundParameter => ({
    kind: ParameterKind.SOUND,
    volume: raw[3],
    soundFile: raw[4],
}));

export const decodeLogEffect = decoder(ParameterKind.LOG_EFFECT, (raw): LogEffectParameter => ({
    kind: ParameterKind.LOG_EFFECT,
    logEffect: raw[3],
    // 4: theme, not used by any fire
    color: readColor(raw, 5),
    pattern: raw[9],
}));

const DECODERS: { readonly [K in ParameterKind]: Decoder<K> } = {
    [ParameterKind.TEMPERATURE_UNIT]: decodeTemperatureUnit,
    [ParameterKind.MODE]: decodeMode,
    [ParameterKind.FLAME_EFFECT]: decodeFlameEffect,
    [ParameterKind.HEAT_SETTINGS]: decodeHeatSettings,
    [ParameterKind.HEAT_MODE]: decodeHeatMode,
    [ParameterKind.TIMER]: decodeTimer,
    [ParameterKind.SOFTWARE_VERSION]: decodeSoftwareVersion,
    [ParameterKind.ERROR]: decodeError,
    [ParameterKind.SOUND]: decodeSound,
    [ParameterKind.LOG_EFFECT]: decodeLogEffect,
};

/**
 * Decode a raw frame whose parameter id was supplied out-of-band.
 * The frame's own header is not consulted.
 */
export function decodeParameter(parameterId: number, raw: Uint8Array): ProtocolResult<Parameter> {
    if (!isParameterKind(parameterId)) {
        return fail(unknownParameter(parameterId));
    }
    const decode: (raw: Uint8Array) => ProtocolResult<Parameter> = DECODERS[parameterId];
    return decode(raw);
}
