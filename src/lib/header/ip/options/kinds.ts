import type { BaseAddress } from "../../../address/base";
import { IPV6Address } from "../../../address/ipv6";
import { uint8_fromNumber } from "../../../binary/uint8-array";
import { assertUint, toIPV6Address } from "../../../packet/fields";
import { IPv6Option, IPV6_OPTION_TYPES, type OptionAlignment } from "./option";

export const ROUTER_ALERT_VALUES = {
    MLD: 0,
    RSVP: 1,
    ACTIVE_NETWORKS: 2,
} as const;

/** <https://www.rfc-editor.org/rfc/rfc2711> */
export class RouterAlert extends IPv6Option {
    readonly type = IPV6_OPTION_TYPES.ROUTER_ALERT;
    readonly alignment: OptionAlignment = [2, 0];

    private _value: number;

    constructor(value: number = ROUTER_ALERT_VALUES.MLD) {
        super();
        this._value = assertUint("value", value, 16);
    }

    get value(): number { return this._value; }
    set value(value: number) { this._value = assertUint("value", value, 16); }

    data(): Uint8Array {
        return uint8_fromNumber(this._value, 2);
    }

    clone(): RouterAlert {
        return new RouterAlert(this._value);
    }

    toString(): string {
        return `RouterAlert(${this._value})`;
    }
}

/** <https://www.rfc-editor.org/rfc/rfc2473#section-5.1> */
export class TunnelEncapsulationLimit extends IPv6Option {
    readonly type = IPV6_OPTION_TYPES.TUNNEL_ENCAPSULATION_LIMIT;

    private _limit: number;

    constructor(limit: number = 4) {
        super();
        this._limit = assertUint("limit", limit, 8);
    }

    get limit(): number { return this._limit; }
    set limit(value: number) { this._limit = assertUint("limit", value, 8); }

    data(): Uint8Array {
        return uint8_fromNumber(this._limit, 1);
    }

    clone(): TunnelEncapsulationLimit {
        return new TunnelEncapsulationLimit(this._limit);
    }

    toString(): string {
        return `TunnelEncapsulationLimit(${this._limit})`;
    }
}

/** <https://www.rfc-editor.org/rfc/rfc6275#section-6.3> */
export class HomeAddress extends IPv6Option {
    readonly type = IPV6_OPTION_TYPES.HOME_ADDRESS;
    readonly alignment: OptionAlignment = [8, 6];

    private _address: IPV6Address;

    constructor(address: BaseAddress | string) {
        super();
        this._address = toIPV6Address("address", address);
    }

    get address(): IPV6Address { return this._address; }
    set address(value: BaseAddress | string) { this._address = toIPV6Address("address", value); }

    data(): Uint8Array {
        return new Uint8Array(this._address.buffer);
    }

    clone(): HomeAddress {
        return new HomeAddress(this._address);
    }

    toString(): string {
        return `HomeAddress(${this._address})`;
    }
}

/** <https://www.rfc-editor.org/rfc/rfc2675> */
export class JumboPayload extends IPv6Option {
    readonly type = IPV6_OPTION_TYPES.JUMBO_PAYLOAD;
    readonly alignment: OptionAlignment = [4, 2];

    private _payloadLength: number;

    constructor(payloadLength: number) {
        super();
        this._payloadLength = assertUint("payloadLength", payloadLength, 32);
    }

    get payloadLength(): number { return this._payloadLength; }
    set payloadLength(value: number) { this._payloadLength = assertUint("payloadLength", value, 32); }

    data(): Uint8Array {
        return uint8_fromNumber(this._payloadLength, 4);
    }

    clone(): JumboPayload {
        return new JumboPayload(this._payloadLength);
    }

    toString(): string {
        return `JumboPayload(${this._payloadLength})`;
    }
}
