/**
 * Protocol errors
 *
 * The codec never throws: failures come back as values inside a
 * ProtocolResult so callers can skip a bad parameter and keep going.
 */

import {ParameterKind} from '../types/flameconnect-enums';

export enum ProtocolErrorCode {
    INSUFFICIENT_DATA = 'INSUFFICIENT_DATA',
    UNKNOWN_PARAMETER = 'UNKNOWN_PARAMETER',
    READ_ONLY = 'READ_ONLY',
}

export interface ProtocolErrorDetails {
    code: ProtocolErrorCode;
    parameterId: number;
    expected?: number;
    actual?: number;
}

export class ProtocolError extends Error {
    readonly code: ProtocolErrorCode;
    readonly parameterId: number;
    readonly expected?: number;
    readonly actual?: number;

    constructor(message: string, details: ProtocolErrorDetails) {
        super(message);
        this.name = 'ProtocolError';
        this.code = details.code;
        this.parameterId = details.parameterId;
        this.expected = details.expected;
        this.actual = details.actual;
    }
}

export type ProtocolResult<T> =
    | { success: true; data: T }
    | { success: false; error: ProtocolError };

export function ok<T>(data: T): ProtocolResult<T> {
    return {success: true, data};
}

export function fail<T>(error: ProtocolError): ProtocolResult<T> {
    return {success: false, error};
}

/** Human readable name of a kind, e.g. 'FlameEffect' */
export function kindName(id: number): string {
    const name: string | undefined = ParameterKind[id];
    if (name === undefined) {
        return `Parameter ${id}`;
    }
    return name.toLowerCase().split('_')
        .map(word => word.charAt(0).toUpperCase() + word.slice(1))
        .join('');
}

export function insufficientData(id: number, expected: number, actual: number): ProtocolError {
    return new ProtocolError(
        `Insufficient data for ${kindName(id)}: expected ${expected} bytes, got ${actual}`,
        {code: ProtocolErrorCode.INSUFFICIENT_DATA, parameterId: id, expected, actual},
    );
}

export function unknownParameter(id: number): ProtocolError {
    return new ProtocolError(
        `Unknown parameter ID: ${id}`,
        {code: ProtocolErrorCode.UNKNOWN_PARAMETER, parameterId: id},
    );
}

export function readOnlyParameter(id: number): ProtocolError {
    return new ProtocolError(
        `${kindName(id)} parameter is read-only and cannot be encoded`,
        {code: ProtocolErrorCode.READ_ONLY, parameterId: id},
    );
}
