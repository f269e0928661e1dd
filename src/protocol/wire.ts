/**
 * Wire primitives shared by the parameter decoders and encoders.
 *
 * Frame layout: bytes 0-1 parameter id (little-endian), byte 2 payload
 * length, payload from byte 3. Colours travel in R, B, G, W order.
 */

import {ParameterKind} from '../types/flameconnect-enums';
import {FRAME_LENGTHS, HEADER_SIZE, RGBWColor} from './parameter-types';
import {insufficientData, ProtocolError} from './protocol-error';

/** Bit 1 of the flame effect brightness byte carries the pulsating flag */
export const PULSATING_BIT = 0b10;

export function readUInt16LE(raw: Uint8Array, offset: number): number {
    return raw[offset] | (raw[offset + 1] << 8);
}

/** Writes the low 16 bits of value; higher bits are dropped */
export function writeUInt16LE(frame: Uint8Array, offset: number, value: number): void {
    frame[offset] = value & 0xff;
    frame[offset + 1] = (value >> 8) & 0xff;
}

/**
 * Allocate a zeroed frame of the kind's fixed length with its header written
 */
export function allocateFrame(kind: ParameterKind): Buffer {
    const length = FRAME_LENGTHS[kind];
    const frame = Buffer.alloc(length);
    makeHeader(kind, length - HEADER_SIZE).copy(frame, 0);
    return frame;
}

export function makeHeader(id: number, payloadLength: number): Buffer {
    const header = Buffer.alloc(HEADER_SIZE);
    writeUInt16LE(header, 0, id);
    header[2] = payloadLength;
    return header;
}

/**
 * Returns an error when raw is shorter than the kind's frame; longer input is fine
 */
export function checkLength(kind: ParameterKind, raw: Uint8Array): ProtocolError | undefined {
    const expected = FRAME_LENGTHS[kind];
    if (raw.length < expected) {
        return insufficientData(kind, expected, raw.length);
    }
    return undefined;
}

/** Whole degrees at offset, tenths at offset + 1 */
export function readTemperature(raw: Uint8Array, offset: number): number {
    return (raw[offset] * 10 + raw[offset + 1]) / 10;
}

export function writeTemperature(frame: Uint8Array, offset: number, value: number): void {
    // Round once so 21.96 carries into the whole degree; bytes wrap modulo 256
    const tenths = Math.round(value * 10);
    frame[offset] = Math.floor(tenths / 10);
    frame[offset + 1] = tenths % 10;
}

export function readColor(raw: Uint8Array, offset: number): RGBWColor {
    return {
        red: raw[offset],
        blue: raw[offset + 1],
        green: raw[offset + 2],
        white: raw[offset + 3],
    };
}

export function writeColor(frame: Uint8Array, offset: number, color: RGBWColor): void {
    frame[offset] = color.red;
    frame[offset + 1] = color.blue;
    frame[offset + 2] = color.green;
    frame[offset + 3] = color.white;
}
