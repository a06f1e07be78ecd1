export class StructValueError extends Error {
    constructor(message: string, public value: unknown) {
        super(`cannot set; ${message}`);
        this.name = "StructValueError";
    }
}

export interface StructType<T> {
    /** bitLength of the value type, `-1` marks a variable length value that consumes the rest of the buffer */
    bitLength: number;
    /** receives the bits of the value right-aligned in `ceil(bitLength / 8)` bytes */
    getter(buf: Uint8Array): T;
    /** returns the value right-aligned, the struct rejects it if any bit above `bitLength` is set */
    setter(value: T): Uint8Array;
}

export type StructTypes<Values> = { [K in keyof Values]: StructType<Values[K]> };

export type StructKey<Values> = Extract<keyof Values, string>;

function readBits(source: Uint8Array, bitOffset: number, bitLength: number): Uint8Array {
    let size = Math.ceil(bitLength / 8);

    if (bitOffset % 8 == 0 && bitLength % 8 == 0) {
        return source.slice(bitOffset / 8, bitOffset / 8 + size);
    }

    let out = new Uint8Array(size);
    let shift = size * 8 - bitLength;

    for (let i = 0; i < bitLength; i++) {
        let src = bitOffset + i;
        if ((source[src >>> 3] >>> (7 - (src & 7))) & 1) {
            let dst = shift + i;
            out[dst >>> 3] |= 0x80 >>> (dst & 7);
        }
    }

    return out;
}

function writeBits(target: Uint8Array, bitOffset: number, bitLength: number, value: Uint8Array) {
    let shift = value.length * 8 - bitLength;

    for (let i = 0; i < bitLength; i++) {
        let src = shift + i,
            dst = bitOffset + i;
        let bit = src >= 0 && ((value[src >>> 3] >>> (7 - (src & 7))) & 1);

        if (bit) {
            target[dst >>> 3] |= 0x80 >>> (dst & 7);
        } else {
            target[dst >>> 3] &= ~(0x80 >>> (dst & 7));
        }
    }
}

/** true if no bit above the lowest `bitLength` bits is set */
function fitsInBits(value: Uint8Array, bitLength: number): boolean {
    let excess = value.length * 8 - bitLength;

    for (let i = 0; i < excess; i++) {
        if ((value[i >>> 3] >>> (7 - (i & 7))) & 1) {
            return false;
        }
    }

    return true;
}

/**
 * A big-endian, bit-packed view over a byte buffer.
 * Values are laid out in declaration order, the total fixed size must be a multiple of 8 bits.
 */
export class Struct<Values extends Record<string, unknown>> {
    readonly order: StructKey<Values>[] = [];

    private types: StructTypes<Values>;
    private offsets: Record<string, number> = {};
    private buffer: Uint8Array;

    constructor(types: StructTypes<Values>) {
        this.types = types;

        let offset = 0;
        for (let key in types) {
            this.order.push(key);
            this.offsets[key] = offset;
            if (types[key].bitLength > 0) {
                offset += types[key].bitLength;
            }
        }

        let validateError = this.validateTypes();
        if (validateError instanceof Error) {
            throw validateError;
        }

        this.buffer = new Uint8Array(this.getMinSize());
    }

    /** RULES: (1) total bitLength MUST be a multiple of 8. (2) variable length value-types MUST be the last value. */
    private validateTypes(): Error | null {
        for (let key of this.order) {
            if (this.types[key].bitLength < 0 && key != this.order.at(-1)) {
                return new Error("cannot define struct; slice must be last value");
            }
        }

        if (this.getMinBitSize() % 8 !== 0) {
            return new Error("cannot define struct; total bitLength MUST be a multiple of 8");
        }

        return null;
    }

    getMinBitSize(): number {
        let last = this.order.at(-1);
        if (!last) return 0;

        return this.offsets[last] + Math.max(0, this.types[last].bitLength);
    }

    getMinSize(): number {
        return this.getMinBitSize() / 8;
    }

    /** true if the last value is variable length */
    isVariable(): boolean {
        let last = this.order.at(-1);
        return last != undefined && this.types[last].bitLength < 0;
    }

    get size() {
        return this.buffer.length;
    }

    get<K extends StructKey<Values>>(key: K): Values[K] {
        let type = this.types[key], offset = this.offsets[key];

        if (type.bitLength < 0) {
            return type.getter(this.buffer.slice(offset / 8));
        }

        return type.getter(readBits(this.buffer, offset, type.bitLength));
    }

    set<K extends StructKey<Values>>(key: K, value: Values[K]): this {
        let type = this.types[key], offset = this.offsets[key];
        let buf = type.setter(value);

        if (type.bitLength < 0) {
            let next = new Uint8Array(offset / 8 + buf.length);
            next.set(this.buffer.subarray(0, offset / 8));
            next.set(buf, offset / 8);
            this.buffer = next;
            return this;
        }

        if (!fitsInBits(buf, type.bitLength)) {
            throw new StructValueError(`"${key}" does not fit in ${type.bitLength} bits`, value);
        }

        writeBits(this.buffer, offset, type.bitLength, buf);
        return this;
    }

    /** creates a new instance of the struct with the given values set */
    create(values: Partial<Values>): Struct<Values> {
        let struct = new Struct<Values>(this.types);
        struct.buffer = new Uint8Array(this.buffer);

        for (let key of this.order) {
            let value = values[key];
            if (value !== undefined) {
                struct.set(key, value);
            }
        }

        return struct;
    }

    /** reads a struct off the front of `buf`, a variable length struct takes all of it */
    from(buf: Uint8Array): Struct<Values> {
        if (buf.length < this.getMinSize()) {
            throw new Error("too few bytes to satisfy struct. " + `${buf.length} < ${this.getMinSize()}`);
        }

        let struct = new Struct<Values>(this.types);
        struct.buffer = new Uint8Array(this.isVariable() ? buf : buf.subarray(0, this.getMinSize()));

        return struct;
    }

    getBuffer(): Uint8Array {
        return this.buffer;
    }
}
