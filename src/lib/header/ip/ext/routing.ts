import type { BaseAddress } from "../../../address/base";
import { IPV6Address } from "../../../address/ipv6";
import { defineStruct, SLICE, UINT8, UINT32 } from "../../../binary/struct";
import { uint8_concat } from "../../../binary/uint8-array";
import { EncodeError, FormatError } from "../../../packet/errors";
import { assertProtocol, assertUint, toIPV6Address } from "../../../packet/fields";
import { assertLength, type ChainedHeader, type Decoded, type Header } from "../../../packet/header";
import { isProtocol, type Protocol, protocolName, PROTOCOLS } from "../protocols";

/** <https://www.rfc-editor.org/rfc/rfc8200#section-4.4> */
export const IPV6_ROUTING_HEADER = defineStruct({
    nextHeader: UINT8,
    hdrExtLen: UINT8,
    routingType: UINT8,
    segmentsLeft: UINT8,
    /** type-specific data, reserved for type 0 */
    reserved: UINT32,
    addresses: SLICE,
});

const PREFIX_LENGTH = IPV6_ROUTING_HEADER.getMinSize();
const ADDRESS_SIZE = IPV6Address.ADDRESS_LENGTH / 8;

/** hdrExtLen counts 8 octet units and each address takes two */
export const MAX_ROUTING_ADDRESSES = 127;

export type IPv6RoutingHeaderValues = {
    nextHeader: Protocol;
    routingType: number;
    /** defaults to the number of addresses */
    segmentsLeft: number;
    reserved: number;
};

type AddressInput = BaseAddress | string;

/**
 * Routing header carrying a list of intermediate addresses.
 * The data after the reserved word is always read as a list of IPv6 addresses.
 */
export class IPv6RoutingHeader implements ChainedHeader {
    static readonly PROTOCOL = PROTOCOLS.IPv6RouteOption;

    static decode(buf: Uint8Array): Decoded<IPv6RoutingHeader> {
        assertLength(IPv6RoutingHeader.name, buf, PREFIX_LENGTH);

        let length = (buf[1] + 1) * 8;
        assertLength(IPv6RoutingHeader.name, buf, length);

        let hdr = IPV6_ROUTING_HEADER.from(buf.subarray(0, length));
        if (!isProtocol(hdr.get("nextHeader"))) {
            throw new FormatError(IPv6RoutingHeader.name, "unassigned next header " + hdr.get("nextHeader"));
        }

        let data = hdr.get("addresses");
        if (data.length % ADDRESS_SIZE != 0) {
            throw new FormatError(IPv6RoutingHeader.name, `${data.length} bytes is not a list of addresses`);
        }

        let addresses: IPV6Address[] = [];
        for (let i = 0; i < data.length; i += ADDRESS_SIZE) {
            addresses.push(new IPV6Address(data.subarray(i, i + ADDRESS_SIZE)));
        }

        return [new IPv6RoutingHeader(addresses, {
            nextHeader: hdr.get("nextHeader"),
            routingType: hdr.get("routingType"),
            segmentsLeft: hdr.get("segmentsLeft"),
            reserved: hdr.get("reserved"),
        }), length];
    }

    readonly kind = "ipv6-routing";

    private _nextHeader: Protocol;
    private _routingType: number;
    private _segmentsLeft: number;
    private _reserved: number;
    private _addresses: IPV6Address[];

    constructor(addresses: AddressInput | readonly AddressInput[] = [], values: Partial<IPv6RoutingHeaderValues> = {}) {
        this._addresses = toAddressList(isAddressList(addresses) ? addresses : [addresses]);
        this._nextHeader = assertProtocol("nextHeader", values.nextHeader ?? PROTOCOLS.IPv6NoNext);
        this._routingType = assertUint("routingType", values.routingType ?? 0, 8);
        this._segmentsLeft = assertUint("segmentsLeft", values.segmentsLeft ?? this._addresses.length, 8);
        this._reserved = assertUint("reserved", values.reserved ?? 0, 32);
    }

    get nextHeader(): Protocol { return this._nextHeader; }
    set nextHeader(value: Protocol) { this._nextHeader = assertProtocol("nextHeader", value); }

    get routingType(): number { return this._routingType; }
    set routingType(value: number) { this._routingType = assertUint("routingType", value, 8); }

    get segmentsLeft(): number { return this._segmentsLeft; }
    set segmentsLeft(value: number) { this._segmentsLeft = assertUint("segmentsLeft", value, 8); }

    get reserved(): number { return this._reserved; }
    set reserved(value: number) { this._reserved = assertUint("reserved", value, 32); }

    get addresses(): readonly IPV6Address[] { return this._addresses; }
    set addresses(value: readonly AddressInput[]) { this._addresses = toAddressList(value); }

    get size(): number {
        return PREFIX_LENGTH + this._addresses.length * ADDRESS_SIZE;
    }

    encode(): Uint8Array {
        if (this._addresses.length > MAX_ROUTING_ADDRESSES) {
            throw new EncodeError(IPv6RoutingHeader.name, `${this._addresses.length} addresses, at most ${MAX_ROUTING_ADDRESSES} fit`);
        }

        return IPV6_ROUTING_HEADER.create({
            nextHeader: this._nextHeader,
            hdrExtLen: this._addresses.length * 2,
            routingType: this._routingType,
            segmentsLeft: this._segmentsLeft,
            reserved: this._reserved,
            addresses: uint8_concat(this._addresses.map(address => address.buffer)),
        }).getBuffer();
    }

    equals(other: Header): boolean {
        return other instanceof IPv6RoutingHeader
            && this._nextHeader == other._nextHeader
            && this._routingType == other._routingType
            && this._segmentsLeft == other._segmentsLeft
            && this._reserved == other._reserved
            && this._addresses.length == other._addresses.length
            && this._addresses.every((address, i) => address.equals(other._addresses[i]));
    }

    clone(): IPv6RoutingHeader {
        return new IPv6RoutingHeader(this._addresses, {
            nextHeader: this._nextHeader,
            routingType: this._routingType,
            segmentsLeft: this._segmentsLeft,
            reserved: this._reserved,
        });
    }

    toString(): string {
        return `IPv6Routing ${protocolName(this._nextHeader)} type=${this._routingType} left=${this._segmentsLeft} [${this._addresses.join(", ")}]`;
    }
}

function isAddressList(value: AddressInput | readonly AddressInput[]): value is readonly AddressInput[] {
    return Array.isArray(value);
}

function toAddressList(addresses: readonly AddressInput[]): IPV6Address[] {
    return addresses.map(address => toIPV6Address("addresses", address));
}
