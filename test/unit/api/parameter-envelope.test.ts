import {buildWriteRequest, decodeWireParameters, encodeWireParameters} from '../../../src/api/parameter-envelope';
import {ProtocolError, ProtocolErrorCode} from '../../../src/protocol';
import {FireMode, ParameterKind, TemperatureUnit, TimerStatus} from '../../../src/types/flameconnect-enums';
import {WireParameter} from '../../../src/api/flameconnect-types';

function base64(...bytes: number[]): string {
    return Buffer.from(bytes).toString('base64');
}

describe('parameter envelope', () => {
    describe('decodeWireParameters', () => {
        it('should decode base64 frames', () => {
            const onError = vi.fn();
            const parameters = decodeWireParameters([
                {ParameterId: 321, Value: base64(0x41, 0x01, 0x03, 1, 22, 5)},
                {ParameterId: 236, Value: base64(0xEC, 0x00, 0x01, 0)},
            ], onError);

            expect(parameters).toEqual([
                {kind: ParameterKind.MODE, mode: FireMode.MANUAL, targetTemperature: 22.5},
                {kind: ParameterKind.TEMPERATURE_UNIT, unit: TemperatureUnit.FAHRENHEIT},
            ]);
            expect(onError).not.toHaveBeenCalled();
        });

        it('should skip and report entries that fail', () => {
            const failures: Array<{entry: WireParameter; error: ProtocolError}> = [];
            const short: WireParameter = {ParameterId: 321, Value: base64(0x41, 0x01, 0x03, 1)};
            const unknown: WireParameter = {ParameterId: 999, Value: base64(1, 2, 3)};

            const parameters = decodeWireParameters(
                [short, unknown, {ParameterId: 236, Value: base64(0xEC, 0x00, 0x01, 1)}],
                (entry, error) => failures.push({entry, error}),
            );

            expect(parameters).toEqual([{kind: ParameterKind.TEMPERATURE_UNIT, unit: TemperatureUnit.CELSIUS}]);
            expect(failures.map(f => f.entry)).toEqual([short, unknown]);
            expect(failures[0].error.message).toBe('Insufficient data for Mode: expected 6 bytes, got 4');
            expect(failures[1].error.code).toBe(ProtocolErrorCode.UNKNOWN_PARAMETER);
        });
    });

    describe('encodeWireParameters', () => {
        it('should encode each parameter under its id', () => {
            const result = encodeWireParameters([
                {kind: ParameterKind.TIMER, timerStatus: TimerStatus.ENABLED, duration: 90},
            ]);

            expect(result).toEqual({
                success: true,
                data: [{ParameterId: 326, Value: base64(0x46, 0x01, 0x03, 1, 90, 0)}],
            });
        });

        it('should refuse read-only parameters', () => {
            const result = encodeWireParameters([{
                kind: ParameterKind.ERROR,
                errorByte1: 0,
                errorByte2: 0,
                errorByte3: 0,
                errorByte4: 0,
            }]);

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.code).toBe(ProtocolErrorCode.READ_ONLY);
                expect(result.error.message).toBe('Error parameter is read-only and cannot be encoded');
            }
        });
    });

    describe('buildWriteRequest', () => {
        it('should wrap the parameters with the fire id', () => {
            const result = buildWriteRequest('fire-0001', [
                {kind: ParameterKind.TEMPERATURE_UNIT, unit: TemperatureUnit.CELSIUS},
            ]);

            expect(result).toEqual({
                success: true,
                data: {FireId: 'fire-0001', Parameters: [{ParameterId: 236, Value: base64(0xEC, 0x00, 0x01, 1)}]},
            });
        });
    });
});
