/**
 * Flame Connect enums used across the plugin.
 * Numeric values are the byte values carried in the fire's binary parameters.
 */

export enum ParameterKind {
    TEMPERATURE_UNIT = 236,
    MODE = 321,
    FLAME_EFFECT = 322,
    HEAT_SETTINGS = 323,
    HEAT_MODE = 325,
    TIMER = 326,
    SOFTWARE_VERSION = 327,
    ERROR = 329,
    SOUND = 369,
    LOG_EFFECT = 370,
}

export enum FireMode {
    STANDBY = 0,
    MANUAL = 1,
}

export enum FlameEffectStatus {
    OFF = 0,
    ON = 1,
}

export enum Brightness {
    HIGH = 0,
    LOW = 1,
}

export enum PulsatingEffect {
    OFF = 0,
    ON = 1,
}

export enum HeatStatus {
    OFF = 0,
    ON = 1,
}

export enum HeatMode {
    NORMAL = 0,
    BOOST = 1,
    ECO = 2,
    FAN_ONLY = 3,
    SCHEDULE = 4,
}

export enum HeatControl {
    SOFTWARE_DISABLED = 0,
    HARDWARE_DISABLED = 1,
    ENABLED = 2,
}

export enum FlameColor {
    ALL = 0,
    YELLOW_RED = 1,
    YELLOW_BLUE = 2,
    BLUE = 3,
    RED = 4,
    YELLOW = 5,
    BLUE_RED = 6,
}

export enum LightStatus {
    OFF = 0,
    ON = 1,
}

export enum TimerStatus {
    DISABLED = 0,
    ENABLED = 1,
}

export enum TemperatureUnit {
    FAHRENHEIT = 0,
    CELSIUS = 1,
}

export enum LogEffectStatus {
    OFF = 0,
    ON = 1,
}

export enum MediaTheme {
    USER_DEFINED = 0,
    WHITE = 1,
    BLUE = 2,
    PURPLE = 3,
    RED = 4,
    GREEN = 5,
    PRISM = 6,
    KALEIDOSCOPE = 7,
    MIDNIGHT = 8,
}

/** Cloud connection state reported for a fire (not part of the binary protocol) */
export enum ConnectionState {
    UNKNOWN = 0,
    NOT_CONNECTED = 1,
    CONNECTED = 2,
    UPDATING_FIRMWARE = 3,
}
