import {isParameterKind, isReadOnlyKind, parameterKindOf, rgbwEquals} from '../../../src/protocol';
import {FireMode, ParameterKind, TimerStatus} from '../../../src/types/flameconnect-enums';

describe('Parameter model', () => {
    describe('rgbwEquals', () => {
        const color = {red: 10, green: 20, blue: 30, white: 40};

        it('should treat colours with the same channels as equal', () => {
            expect(rgbwEquals(color, {red: 10, green: 20, blue: 30, white: 40})).toBe(true);
        });

        it('should tell colours apart by any single channel', () => {
            expect(rgbwEquals(color, {...color, red: 11})).toBe(false);
            expect(rgbwEquals(color, {...color, green: 21})).toBe(false);
            expect(rgbwEquals(color, {...color, blue: 31})).toBe(false);
            expect(rgbwEquals(color, {...color, white: 41})).toBe(false);
        });
    });

    describe('parameterKindOf', () => {
        it('should return the variant tag', () => {
            expect(parameterKindOf({kind: ParameterKind.MODE, mode: FireMode.MANUAL, targetTemperature: 22})).toBe(ParameterKind.MODE);
            expect(parameterKindOf({kind: ParameterKind.TIMER, timerStatus: TimerStatus.ENABLED, duration: 30})).toBe(ParameterKind.TIMER);
        });
    });

    describe('kind guards', () => {
        it('should recognise known parameter ids only', () => {
            expect(isParameterKind(321)).toBe(true);
            expect(isParameterKind(999)).toBe(false);
        });

        it('should mark software version and error as read-only', () => {
            expect(isReadOnlyKind(ParameterKind.SOFTWARE_VERSION)).toBe(true);
            expect(isReadOnlyKind(ParameterKind.ERROR)).toBe(true);
            expect(isReadOnlyKind(ParameterKind.MODE)).toBe(false);
        });
    });
});
