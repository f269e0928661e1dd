/**
 * Fireplace Parameter Model
 *
 * Immutable value records for every parameter kind a Flame Connect fire
 * exchanges with the cloud. The `kind` tag is the wire parameter id.
 */

import {
    Brightness,
    FireMode,
    FlameColor,
    FlameEffectStatus,
    HeatControl,
    HeatMode,
    HeatStatus,
    LightStatus,
    LogEffectStatus,
    MediaTheme,
    ParameterKind,
    PulsatingEffect,
    TemperatureUnit,
    TimerStatus,
} from '../types/flameconnect-enums';

/** Light colour as four 0-255 channels */
export interface RGBWColor {
    readonly red: number;
    readonly green: number;
    readonly blue: number;
    readonly white: number;
}

export interface TemperatureUnitParameter {
    readonly kind: ParameterKind.TEMPERATURE_UNIT;
    readonly unit: TemperatureUnit;
}

export interface ModeParameter {
    readonly kind: ParameterKind.MODE;
    readonly mode: FireMode;
    /** Degrees with one decimal, in the fire's display unit */
    readonly targetTemperature: number;
}

export interface FlameEffectParameter {
    readonly kind: ParameterKind.FLAME_EFFECT;
    readonly flameEffect: FlameEffectStatus;
    /** 1-5 */
    readonly flameSpeed: number;
    readonly brightness: Brightness;
    readonly pulsatingEffect: PulsatingEffect;
    readonly mediaTheme: MediaTheme;
    readonly mediaLight: LightStatus;
    readonly mediaColor: RGBWColor;
    readonly overheadLight: LightStatus;
    readonly overheadColor: RGBWColor;
    readonly lightStatus: LightStatus;
    readonly flameColor: FlameColor;
    readonly ambientSensor: LightStatus;
}

export interface HeatSettingsParameter {
    readonly kind: ParameterKind.HEAT_SETTINGS;
    readonly heatStatus: HeatStatus;
    readonly heatMode: HeatMode;
    readonly setpointTemperature: number;
    /** Minutes */
    readonly boostDuration: number;
}

export interface HeatModeParameter {
    readonly kind: ParameterKind.HEAT_MODE;
    readonly heatControl: HeatControl;
}

export interface TimerParameter {
    readonly kind: ParameterKind.TIMER;
    readonly timerStatus: TimerStatus;
    /** Minutes */
    readonly duration: number;
}

export interface SoftwareVersionParameter {
    readonly kind: ParameterKind.SOFTWARE_VERSION;
    readonly uiMajor: number;
    readonly uiMinor: number;
    readonly uiTest: number;
    readonly controlMajor: number;
    readonly controlMinor: number;
    readonly controlTest: number;
    readonly relayMajor: number;
    readonly relayMinor: number;
    readonly relayTest: number;
}

export interface ErrorParameter {
    readonly kind: ParameterKind.ERROR;
    readonly errorByte1: number;
    readonly errorByte2: number;
    readonly errorByte3: number;
    readonly errorByte4: number;
}

export interface SoundParameter {
    readonly kind: ParameterKind.SOUND;
    readonly volume: number;
    readonly soundFile: number;
}

export interface LogEffectParameter {
    readonly kind: ParameterKind.LOG_EFFECT;
    readonly logEffect: LogEffectStatus;
    readonly color: RGBWColor;
    readonly pattern: number;
}

export type Parameter =
    | TemperatureUnitParameter
    | ModeParameter
    | FlameEffectParameter
    | HeatSettingsParameter
    | HeatModeParameter
    | TimerParameter
    | SoftwareVersionParameter
    | ErrorParameter
    | SoundParameter
    | LogEffectParameter;

/** The variant carried by a given kind */
export type ParameterOf<K extends ParameterKind> = Extract<Parameter, { kind: K }>;

export type ReadOnlyParameterKind = ParameterKind.SOFTWARE_VERSION | ParameterKind.ERROR;

export type WritableParameter = Exclude<Parameter, { kind: ReadOnlyParameterKind }>;

/** Size of the id + length header that starts every frame */
export const HEADER_SIZE = 3;

/** Total frame length (header included) per kind */
export const FRAME_LENGTHS = {
    [ParameterKind.TEMPERATURE_UNIT]: 4,
    [ParameterKind.MODE]: 6,
    [ParameterKind.FLAME_EFFECT]: 23,
    [ParameterKind.HEAT_SETTINGS]: 10,
    [ParameterKind.HEAT_MODE]: 4,
    [ParameterKind.TIMER]: 6,
    [ParameterKind.SOFTWARE_VERSION]: 12,
    [ParameterKind.ERROR]: 7,
    [ParameterKind.SOUND]: 5,
    [ParameterKind.LOG_EFFECT]: 11,
} as const satisfies Record<ParameterKind, number>;

const READ_ONLY_KINDS: ReadonlySet<ParameterKind> = new Set([
    ParameterKind.SOFTWARE_VERSION,
    ParameterKind.ERROR,
]);

const KNOWN_KINDS: ReadonlySet<number> = new Set(
    Object.keys(FRAME_LENGTHS).map(Number),
);

export function isParameterKind(id: number): id is ParameterKind {
    return KNOWN_KINDS.has(id);
}

export function isReadOnlyKind(kind: ParameterKind): kind is ReadOnlyParameterKind {
    return READ_ONLY_KINDS.has(kind);
}

export function parameterKindOf(param: Parameter): ParameterKind {
    return param.kind;
}

/**
 * Narrow a parameter to the variant of the given kind
 */
export function isParameterOfKind<K extends ParameterKind>(param: Parameter, kind: K): param is ParameterOf<K> {
    return param.kind === kind;
}

export function rgbwEquals(a: RGBWColor, b: RGBWColor): boolean {
    return a.red === b.red && a.green === b.green && a.blue === b.blue && a.white === b.white;
}
