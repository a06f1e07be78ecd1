// <https://www.rfc-editor.org/rfc/rfc8200#section-4.2>

import { defineStruct, SLICE, StructValueError, UINT8 } from "../../../binary/struct";
import { uint8_equals, uint8_toHex } from "../../../binary/uint8-array";
import { assertUint } from "../../../packet/fields";

export const IPV6_OPTION_TYPES = {
    PAD1: 0x00,
    PADN: 0x01,
    TUNNEL_ENCAPSULATION_LIMIT: 0x04,
    ROUTER_ALERT: 0x05,
    JUMBO_PAYLOAD: 0xc2,
    HOME_ADDRESS: 0xc9,
} as const;

export const IPV6_OPTION = defineStruct({
    type: UINT8,
    len: UINT8,
    data: SLICE,
});

/** largest value a single option can carry */
export const MAX_OPTION_DATA_LENGTH = 0xff;

/** what a node that does not recognise the option does, encoded in the two high-order bits of the type */
export type OptionAction = "skip" | "discard" | "discard-icmp" | "discard-icmp-unicast";

const OPTION_ACTIONS: readonly OptionAction[] = ["skip", "discard", "discard-icmp", "discard-icmp-unicast"];

export function optionAction(type: number): OptionAction {
    return OPTION_ACTIONS[(type >>> 6) & 0b11];
}

/** third-highest bit of the type */
export function optionMayChange(type: number): boolean {
    return (type & 0x20) != 0;
}

/** the option must start at an offset `x * n + y` from the start of its header */
export type OptionAlignment = readonly [x: number, y: number];

export abstract class IPv6Option {
    abstract readonly type: number;
    readonly alignment: OptionAlignment = [1, 0];

    /** the value field as it is encoded */
    abstract data(): Uint8Array;
    abstract clone(): IPv6Option;

    get size(): number {
        return 2 + this.data().length;
    }

    encode(): Uint8Array {
        return IPV6_OPTION.create({
            type: this.type,
            len: this.data().length,
            data: this.data(),
        }).getBuffer();
    }

    equals(other: IPv6Option): boolean {
        return other.constructor === this.constructor
            && other.type == this.type
            && uint8_equals(other.data(), this.data());
    }

    toString(): string {
        return `${this.constructor.name}(${uint8_toHex(this.data())})`;
    }
}

/** single octet of padding, the only option without a length field */
export class Pad1 extends IPv6Option {
    readonly type = IPV6_OPTION_TYPES.PAD1;

    data(): Uint8Array {
        return new Uint8Array(0);
    }

    get size(): number {
        return 1;
    }

    encode(): Uint8Array {
        return new Uint8Array([this.type]);
    }

    clone(): Pad1 {
        return new Pad1();
    }

    toString(): string {
        return "Pad1";
    }
}

/** `count` octets of padding including the type and length octets */
export class PadN extends IPv6Option {
    readonly type = IPV6_OPTION_TYPES.PADN;

    private _count: number;

    constructor(count: number = 2) {
        super();
        this._count = PadN.assertCount(count);
    }

    private static assertCount(count: number): number {
        if (!Number.isInteger(count) || count < 2 || count > MAX_OPTION_DATA_LENGTH + 2) {
            throw new StructValueError("PadN count must be between 2 and " + (MAX_OPTION_DATA_LENGTH + 2), count);
        }
        return count;
    }

    get count(): number { return this._count; }
    set count(value: number) { this._count = PadN.assertCount(value); }

    data(): Uint8Array {
        return new Uint8Array(this._count - 2);
    }

    clone(): PadN {
        return new PadN(this._count);
    }

    toString(): string {
        return `PadN(${this._count})`;
    }
}

/** option type this library has no decoder for, the value is kept verbatim */
export class UnknownOption extends IPv6Option {
    readonly type: number;
    value: Uint8Array;

    constructor(type: number, value: Uint8Array = new Uint8Array(0)) {
        super();
        this.type = assertUint("type", type, 8);
        this.value = new Uint8Array(value);
    }

    data(): Uint8Array {
        return this.value;
    }

    clone(): UnknownOption {
        return new UnknownOption(this.type, this.value);
    }

    toString(): string {
        return `Option${this.type}(${uint8_toHex(this.value)})`;
    }
}
