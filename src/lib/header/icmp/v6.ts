// <https://www.rfc-editor.org/rfc/rfc4443>

import { uint8_equals, uint8_toHex } from "../../binary/uint8-array";
import { defineStruct, SLICE, UINT16, UINT8 } from "../../binary/struct";
import { assertUint } from "../../packet/fields";
import { assertLength, findPreceding, type Decoded, type EncodeContext, type Header } from "../../packet/header";
import { IPv6Header, upperLayerChecksum } from "../ip/ipv6";
import { PROTOCOLS } from "../ip/protocols";

export const ICMPV6_TYPES = {
    DESTINATION_UNREACHABLE: 1,
    PACKET_TOO_BIG: 2,
    TIME_EXCEEDED: 3,
    PARAMETER_PROBLEM: 4,

    ECHO_REQUEST: 128,
    ECHO_REPLY: 129,

    ROUTER_SOLICITATION: 133,
    ROUTER_ADVERTISEMENT: 134,
    NEIGHBOR_SOLICITATION: 135,
    NEIGHBOR_ADVERTISEMENT: 136,
} as const;

export const ICMPV6_HEADER = defineStruct({
    type: UINT8,
    code: UINT8,
    csum: UINT16,
    body: SLICE,
});

export type ICMPv6HeaderValues = {
    type: number;
    code: number;
    /** rest of header followed by the message, ie. identifier and sequence number for echo */
    body: Uint8Array;
};

/**
 * ICMPv6 message, decoded as a leaf: it takes every byte left in the IPv6 payload.
 * The checksum is filled in on encode when an IPv6 header precedes it.
 */
export class ICMPv6Header implements Header {
    static readonly PROTOCOL = PROTOCOLS.ICMPv6;

    static decode(buf: Uint8Array): Decoded<ICMPv6Header> {
        assertLength(ICMPv6Header.name, buf, ICMPV6_HEADER.getMinSize());
        let hdr = ICMPV6_HEADER.from(buf);

        let icmp = new ICMPv6Header({
            type: hdr.get("type"),
            code: hdr.get("code"),
            body: hdr.get("body"),
        });
        icmp.checksum = hdr.get("csum");

        return [icmp, hdr.size];
    }

    readonly kind = "icmpv6";
    /** as decoded, encode computes its own */
    checksum = 0;
    body: Uint8Array;

    private _type: number;
    private _code: number;

    constructor(values: Partial<ICMPv6HeaderValues> = {}) {
        this._type = assertUint("type", values.type ?? ICMPV6_TYPES.ECHO_REQUEST, 8);
        this._code = assertUint("code", values.code ?? 0, 8);
        this.body = values.body ? new Uint8Array(values.body) : new Uint8Array(4);
    }

    get type(): number { return this._type; }
    set type(value: number) { this._type = assertUint("type", value, 8); }

    get code(): number { return this._code; }
    set code(value: number) { this._code = assertUint("code", value, 8); }

    get size(): number {
        return ICMPV6_HEADER.getMinSize() + this.body.length;
    }

    encode(context?: EncodeContext): Uint8Array {
        let hdr = ICMPV6_HEADER.create({
            type: this._type,
            code: this._code,
            csum: 0,
            body: this.body,
        });

        let ip = context && findPreceding(context, IPv6Header);
        if (ip) {
            hdr.set("csum", upperLayerChecksum(ip, PROTOCOLS.ICMPv6, hdr.getBuffer()));
        }

        return hdr.getBuffer();
    }

    equals(other: Header): boolean {
        return other instanceof ICMPv6Header
            && this._type == other._type
            && this._code == other._code
            && uint8_equals(this.body, other.body);
    }

    clone(): ICMPv6Header {
        let icmp = new ICMPv6Header({ type: this._type, code: this._code, body: this.body });
        icmp.checksum = this.checksum;
        return icmp;
    }

    toString(): string {
        return `ICMPv6 type=${this._type} code=${this._code} ${uint8_toHex(this.body)}`;
    }
}
