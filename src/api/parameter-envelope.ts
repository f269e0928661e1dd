/**
 * Parameter envelope
 *
 * Converts between the JSON `{ParameterId, Value}` entries exchanged with
 * the cloud and decoded parameters. Values are base64 wire frames.
 */

import {
    decodeParameter,
    encodeParameter,
    fail,
    ok,
    Parameter,
    ProtocolError,
    ProtocolResult,
} from '../protocol';
import type {WireParameter, WriteParametersRequest} from './flameconnect-types';

/**
 * Decode every entry; an entry that fails is reported and skipped
 */
export function decodeWireParameters(
    entries: readonly WireParameter[],
    onError: (entry: WireParameter, error: ProtocolError) => void,
): Parameter[] {
    const parameters: Parameter[] = [];
    for (const entry of entries) {
        const result = decodeParameter(entry.ParameterId, Buffer.from(entry.Value, 'base64'));
        if (result.success) {
            parameters.push(result.data);
        } else {
            onError(entry, result.error);
        }
    }
    return parameters;
}

/**
 * Encode parameters for a write; the first failure aborts the batch
 */
export function encodeWireParameters(params: readonly Parameter[]): ProtocolResult<WireParameter[]> {
    const entries: WireParameter[] = [];
    for (const param of params) {
        const result = encodeParameter(param);
        if (!result.success) {
            return fail(result.error);
        }
        entries.push({ParameterId: param.kind, Value: result.data.toString('base64')});
    }
    return ok(entries);
}

export function buildWriteRequest(fireId: string, params: readonly Parameter[]): ProtocolResult<WriteParametersRequest> {
    const encoded = encodeWireParameters(params);
    if (!encoded.success) {
        return fail(encoded.error);
    }
    return ok({FireId: fireId, Parameters: encoded.data});
}
