import {
    currentTargetTemperature,
    findParameter,
    FireCommandError,
    mergeParameters,
    requireParameter,
    temperatureUnitParameter,
    timerParameter,
    turnOffParameters,
    turnOnParameters,
    updateFlameEffect,
    updateHeatSettings,
} from '../../../src/api/fire-commands';
import {
    FireMode,
    FlameEffectStatus,
    HeatMode,
    ParameterKind,
    TemperatureUnit,
    TimerStatus,
} from '../../../src/types/flameconnect-enums';
import {createParameters, flameEffect, heatSettings, standbyMode} from '../../helpers/fires';

describe('fire commands', () => {
    describe('findParameter / requireParameter', () => {
        it('should find a parameter by kind', () => {
            expect(findParameter(createParameters(), ParameterKind.HEAT_SETTINGS)).toBe(heatSettings);
        });

        it('should return undefined for a missing kind', () => {
            expect(findParameter(createParameters(), ParameterKind.TIMER)).toBeUndefined();
        });

        it('should throw for a required missing kind', () => {
            expect(() => requireParameter([], ParameterKind.FLAME_EFFECT)).toThrow('No FlameEffect parameter found');
        });
    });

    describe('currentTargetTemperature', () => {
        it('should read the mode temperature', () => {
            expect(currentTargetTemperature(createParameters())).toBe(21.5);
        });

        it('should fall back to 22 degrees', () => {
            expect(currentTargetTemperature([])).toBe(22);
        });
    });

    describe('turnOnParameters', () => {
        it('should select manual mode and light the flame', () => {
            expect(turnOnParameters(createParameters())).toEqual([
                {kind: ParameterKind.MODE, mode: FireMode.MANUAL, targetTemperature: 21.5},
                {...flameEffect, flameEffect: FlameEffectStatus.ON},
            ]);
        });

        it('should write only the mode when no flame effect is known', () => {
            expect(turnOnParameters([])).toEqual([
                {kind: ParameterKind.MODE, mode: FireMode.MANUAL, targetTemperature: 22},
            ]);
        });
    });

    describe('turnOffParameters', () => {
        it('should select standby at the current temperature', () => {
            expect(turnOffParameters([{...standbyMode, mode: FireMode.MANUAL}])).toEqual([standbyMode]);
        });
    });

    describe('updateFlameEffect', () => {
        it('should keep untouched fields', () => {
            expect(updateFlameEffect(createParameters(), {flameSpeed: 5})).toEqual({...flameEffect, flameSpeed: 5});
        });

        it('should reject a flame speed out of range', () => {
            expect(() => updateFlameEffect(createParameters(), {flameSpeed: 6})).toThrow(FireCommandError);
            expect(() => updateFlameEffect(createParameters(), {flameSpeed: 2.5})).toThrow('Flame speed must be between 1 and 5');
        });
    });

    describe('updateHeatSettings', () => {
        it('should change only the setpoint', () => {
            expect(updateHeatSettings(createParameters(), {setpointTemperature: 23.5}))
                .toEqual({...heatSettings, setpointTemperature: 23.5});
        });

        it('should reject a boost duration over the field size', () => {
            expect(() => updateHeatSettings(createParameters(), {heatMode: HeatMode.BOOST, boostDuration: 70000}))
                .toThrow('Boost duration must be between 0 and 65535 minutes');
        });
    });

    describe('timerParameter', () => {
        it('should enable a countdown', () => {
            expect(timerParameter(90)).toEqual({kind: ParameterKind.TIMER, timerStatus: TimerStatus.ENABLED, duration: 90});
        });

        it('should disable the timer at zero', () => {
            expect(timerParameter(0)).toEqual({kind: ParameterKind.TIMER, timerStatus: TimerStatus.DISABLED, duration: 0});
        });

        it('should reject fractional minutes', () => {
            expect(() => timerParameter(1.5)).toThrow('Timer must be between 0 and 65535 minutes');
        });
    });

    it('should build a temperature unit parameter', () => {
        expect(temperatureUnitParameter(TemperatureUnit.FAHRENHEIT))
            .toEqual({kind: ParameterKind.TEMPERATURE_UNIT, unit: TemperatureUnit.FAHRENHEIT});
    });

    describe('mergeParameters', () => {
        it('should replace same kinds in place and append new ones', () => {
            const timer = timerParameter(30);
            const manual = {...standbyMode, mode: FireMode.MANUAL};

            expect(mergeParameters(createParameters(), [timer, manual])).toEqual([
                manual,
                flameEffect,
                heatSettings,
                timer,
            ]);
        });
    });
});
