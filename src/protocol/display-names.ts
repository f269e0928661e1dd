/**
 * Human readable names for parameter values, used in log output.
 */

import {
    Brightness,
    ConnectionState,
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
import {Parameter, RGBWColor} from './parameter-types';

export const FIRE_MODE_NAMES: Record<FireMode, string> = {
    [FireMode.STANDBY]: 'Standby',
    [FireMode.MANUAL]: 'On',
};

export const FLAME_EFFECT_NAMES: Record<FlameEffectStatus, string> = {
    [FlameEffectStatus.OFF]: 'Off',
    [FlameEffectStatus.ON]: 'On',
};

export const BRIGHTNESS_NAMES: Record<Brightness, string> = {
    [Brightness.HIGH]: 'High',
    [Brightness.LOW]: 'Low',
};

export const PULSATING_NAMES: Record<PulsatingEffect, string> = {
    [PulsatingEffect.OFF]: 'Off',
    [PulsatingEffect.ON]: 'On',
};

export const HEAT_STATUS_NAMES: Record<HeatStatus, string> = {
    [HeatStatus.OFF]: 'Off',
    [HeatStatus.ON]: 'On',
};

export const HEAT_MODE_NAMES: Record<HeatMode, string> = {
    [HeatMode.NORMAL]: 'Normal',
    [HeatMode.BOOST]: 'Boost',
    [HeatMode.ECO]: 'Eco',
    [HeatMode.FAN_ONLY]: 'Fan Only',
    [HeatMode.SCHEDULE]: 'Schedule',
};

export const HEAT_CONTROL_NAMES: Record<HeatControl, string> = {
    [HeatControl.SOFTWARE_DISABLED]: 'Software Disabled',
    [HeatControl.HARDWARE_DISABLED]: 'Hardware Disabled',
    [HeatControl.ENABLED]: 'Enabled',
};

export const FLAME_COLOR_NAMES: Record<FlameColor, string> = {
    [FlameColor.ALL]: 'All',
    [FlameColor.YELLOW_RED]: 'Yellow/Red',
    [FlameColor.YELLOW_BLUE]: 'Yellow/Blue',
    [FlameColor.BLUE]: 'Blue',
    [FlameColor.RED]: 'Red',
    [FlameColor.YELLOW]: 'Yellow',
    [FlameColor.BLUE_RED]: 'Blue/Red',
};

export const LIGHT_STATUS_NAMES: Record<LightStatus, string> = {
    [LightStatus.OFF]: 'Off',
    [LightStatus.ON]: 'On',
};

export const TIMER_STATUS_NAMES: Record<TimerStatus, string> = {
    [TimerStatus.DISABLED]: 'Disabled',
    [TimerStatus.ENABLED]: 'Enabled',
};

export const TEMPERATURE_UNIT_NAMES: Record<TemperatureUnit, string> = {
    [TemperatureUnit.FAHRENHEIT]: 'Fahrenheit',
    [TemperatureUnit.CELSIUS]: 'Celsius',
};

export const LOG_EFFECT_NAMES: Record<LogEffectStatus, string> = {
    [LogEffectStatus.OFF]: 'Off',
    [LogEffectStatus.ON]: 'On',
};

export const MEDIA_THEME_NAMES: Record<MediaTheme, string> = {
    [MediaTheme.USER_DEFINED]: 'User Defined',
    [MediaTheme.WHITE]: 'White',
    [MediaTheme.BLUE]: 'Blue',
    [MediaTheme.PURPLE]: 'Purple',
    [MediaTheme.RED]: 'Red',
    [MediaTheme.GREEN]: 'Green',
    [MediaTheme.PRISM]: 'Prism',
    [MediaTheme.KALEIDOSCOPE]: 'Kaleidoscope',
    [MediaTheme.MIDNIGHT]: 'Midnight',
};

export const CONNECTION_STATE_NAMES: Record<ConnectionState, string> = {
    [ConnectionState.UNKNOWN]: 'Unknown',
    [ConnectionState.NOT_CONNECTED]: 'Not Connected',
    [ConnectionState.CONNECTED]: 'Connected',
    [ConnectionState.UPDATING_FIRMWARE]: 'Updating Firmware',
};

/**
 * Look up a value's name; values the fire reports outside the table
 * come back as `Unknown(n)`
 */
export function displayName<E extends number>(names: Record<E, string>, value: E): string {
    const name: string | undefined = names[value];
    return name ?? `Unknown(${value})`;
}

export function formatColor(color: RGBWColor): string {
    return `RGBW(${color.red}, ${color.green}, ${color.blue}, ${color.white})`;
}

/**
 * One-line summary of a parameter
 */
export function describeParameter(param: Parameter): string {
    switch (param.kind) {
        case ParameterKind.TEMPERATURE_UNIT:
            return `Temperature unit: ${displayName(TEMPERATURE_UNIT_NAMES, param.unit)}`;
        case ParameterKind.MODE:
            return `Mode: ${displayName(FIRE_MODE_NAMES, param.mode)}, ${param.targetTemperature}°`;
        case ParameterKind.FLAME_EFFECT:
            return [
                `Flame: ${displayName(FLAME_EFFECT_NAMES, param.flameEffect)}`,
                `speed ${param.flameSpeed}/5`,
                `brightness ${displayName(BRIGHTNESS_NAMES, param.brightness)}`,
                `pulsating ${displayName(PULSATING_NAMES, param.pulsatingEffect)}`,
                `color ${displayName(FLAME_COLOR_NAMES, param.flameColor)}`,
                `media ${displayName(MEDIA_THEME_NAMES, param.mediaTheme)} ${formatColor(param.mediaColor)}`,
                `overhead ${displayName(LIGHT_STATUS_NAMES, param.overheadLight)} ${formatColor(param.overheadColor)}`,
            ].join(', ');
        case ParameterKind.HEAT_SETTINGS:
            return `Heat: ${displayName(HEAT_STATUS_NAMES, param.heatStatus)}, `
                + `${displayName(HEAT_MODE_NAMES, param.heatMode)}, ${param.setpointTemperature}°, `
                + `boost ${param.boostDuration} min`;
        case ParameterKind.HEAT_MODE:
            return `Heat control: ${displayName(HEAT_CONTROL_NAMES, param.heatControl)}`;
        case ParameterKind.TIMER:
            return `Timer: ${displayName(TIMER_STATUS_NAMES, param.timerStatus)}, ${param.duration} min`;
        case ParameterKind.SOFTWARE_VERSION:
            return `Software: UI ${param.uiMajor}.${param.uiMinor}.${param.uiTest}, `
                + `control ${param.controlMajor}.${param.controlMinor}.${param.controlTest}, `
                + `relay ${param.relayMajor}.${param.relayMinor}.${param.relayTest}`;
        case ParameterKind.ERROR: {
            const bytes = [param.errorByte1, param.errorByte2, param.errorByte3, param.errorByte4];
            const faults = bytes.some(b => b !== 0) ? 'active faults' : 'no faults';
            return `Error: ${bytes.map(b => `0x${b.toString(16).toUpperCase().padStart(2, '0')}`).join(' ')} (${faults})`;
        }
        case ParameterKind.SOUND:
            return `Sound: volume ${param.volume}/255, file ${param.soundFile}`;
        case ParameterKind.LOG_EFFECT:
            return `Log effect: ${displayName(LOG_EFFECT_NAMES, param.logEffect)}, `
                + `${formatColor(param.color)}, pattern ${param.pattern}`;
    }
}
