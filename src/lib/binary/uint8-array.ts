import { Buffer } from "buffer";

/**
 * Big-endian helpers shared by every header codec.
 * Values are plain `number`s, so widths above 6 bytes are not representable.
 */

export function uint8_equals(a: Uint8Array, b: Uint8Array): boolean {
    if (a.byteLength != b.byteLength) {
        return false;
    }

    for (let i = 0; i < a.byteLength; i++) {
        if (a[i] != b[i]) {
            return false;
        }
    }

    return true;
}

export function uint8_concat(list: readonly Uint8Array[]): Uint8Array {
    let totalLength = list.reduce((sum, { byteLength }) => sum + byteLength, 0);
    let buffer = new Uint8Array(totalLength);

    let offset = 0;
    for (let item of list) {
        buffer.set(item, offset);
        offset += item.byteLength;
    }

    return buffer;
}

/** encodes `n` as an unsigned big-endian integer of exactly `len` bytes */
export function uint8_fromNumber(n: number, len: number = 1): Uint8Array {
    if (!Number.isSafeInteger(n) || n < 0) {
        throw new RangeError(n + ": is not an unsigned integer");
    }

    let buf = new Uint8Array(len);
    let i = len;
    while (i-- > 0) {
        buf[i] = n % 256;
        n = Math.floor(n / 256);
    }

    if (n > 0) {
        throw new RangeError("value does not fit in " + len + " bytes");
    }

    return buf;
}

/** reads an unsigned big-endian integer of `len` bytes starting at `offset` */
export function uint8_readUint(source: Uint8Array, offset: number = 0, len: number = source.byteLength - offset): number {
    if (offset < 0 || offset + len > source.byteLength) {
        throw new RangeError(`cannot read ${len} bytes at offset ${offset}; buffer holds ${source.byteLength}`);
    }

    let n = 0;
    for (let i = offset; i < offset + len; i++) {
        // multiplication keeps 32 bit values positive
        n = n * 256 + source[i];
    }

    return n;
}

/** decodes a `len` byte integer off the front of `source` and returns what is left */
export function uint8_takeUint(source: Uint8Array, len: number): [value: number, rest: Uint8Array] {
    return [uint8_readUint(source, 0, len), source.subarray(len)];
}

export function uint8_readUint16BE(source: Uint8Array, offset = 0) {
    return uint8_readUint(source, offset, 2);
}

export function uint8_readUint32BE(source: Uint8Array, offset = 0) {
    return uint8_readUint(source, offset, 4);
}

export function uint8_toHex(source: Uint8Array): string {
    return Buffer.from(source.buffer, source.byteOffset, source.byteLength).toString("hex");
}
