import { uint8_equals, uint8_toHex } from "../binary/uint8-array";
import type { Decoded, Header } from "../packet/header";

/** bytes of a protocol this library does not decode, always the last header of a packet */
export class RawPayload implements Header {
    static decode(buf: Uint8Array): Decoded<RawPayload> {
        return [new RawPayload(buf), buf.length];
    }

    readonly kind = "raw";
    data: Uint8Array;

    constructor(data: Uint8Array = new Uint8Array(0)) {
        this.data = new Uint8Array(data);
    }

    get size(): number {
        return this.data.length;
    }

    encode(): Uint8Array {
        return new Uint8Array(this.data);
    }

    equals(other: Header): boolean {
        return other instanceof RawPayload && uint8_equals(this.data, other.data);
    }

    clone(): RawPayload {
        return new RawPayload(this.data);
    }

    toString(): string {
        return `Raw(${uint8_toHex(this.data)})`;
    }
}
