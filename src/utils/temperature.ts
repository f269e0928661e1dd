/**
 * Temperature conversion between the fire's display unit and HomeKit, which is always Celsius
 */

import {TemperatureUnit} from '../types/flameconnect-enums';

/** Round to the tenth-degree resolution the wire format carries */
export function roundToTenth(value: number): number {
    return Math.round(value * 10) / 10;
}

export function fahrenheitToCelsius(value: number): number {
    return roundToTenth((value - 32) * 5 / 9);
}

export function celsiusToFahrenheit(value: number): number {
    return roundToTenth(value * 9 / 5 + 32);
}

/**
 * Fire temperature in Celsius
 */
export function toCelsius(value: number, unit: TemperatureUnit): number {
    return unit === TemperatureUnit.FAHRENHEIT ? fahrenheitToCelsius(value) : roundToTenth(value);
}

/**
 * Celsius value in the fire's unit
 */
export function fromCelsius(value: number, unit: TemperatureUnit): number {
    return unit === TemperatureUnit.FAHRENHEIT ? celsiusToFahrenheit(value) : roundToTenth(value);
}
