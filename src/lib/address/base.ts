export class BaseAddress {
    static ADDRESS_LENGTH = 0;
    static parse(input: string): Uint8Array {
        throw new Error("Not Implemented! " + input);
    }

    buffer: Uint8Array;

    constructor(input: Uint8Array) {
        this.buffer = input;
    }

    toString(): string {
        throw new Error("Not Implemented!");
    }

    equals(other: BaseAddress): boolean {
        return addressEquals(this, other);
    }
}

/** addresses are equal when they are of the same family and hold the same bytes */
export function addressEquals(a: BaseAddress, b: BaseAddress): boolean {
    if (a.constructor !== b.constructor || a.buffer.length != b.buffer.length) {
        return false;
    }

    return a.buffer.every((n, i) => n == b.buffer[i]);
}
