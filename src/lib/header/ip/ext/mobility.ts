import { defineStruct, SLICE, UINT8, UINT16 } from "../../../binary/struct";
import { uint8_equals, uint8_toHex } from "../../../binary/uint8-array";
import { EncodeError, FormatError } from "../../../packet/errors";
import { assertProtocol, assertUint } from "../../../packet/fields";
import { assertLength, findPreceding, type ChainedHeader, type Decoded, type EncodeContext, type Header } from "../../../packet/header";
import { IPv6Header, upperLayerChecksum } from "../ipv6";
import { isProtocol, type Protocol, protocolName, PROTOCOLS } from "../protocols";

/** <https://www.rfc-editor.org/rfc/rfc6275#section-6.1.1> */
export const IPV6_MOBILITY_HEADER = defineStruct({
    payloadProto: UINT8,
    /** length in 8-octet units, not including the first 8 octets */
    hdrLen: UINT8,
    mhType: UINT8,
    reserved: UINT8,
    csum: UINT16,
    data: SLICE,
});

const PREFIX_LENGTH = IPV6_MOBILITY_HEADER.getMinSize();

export const MOBILITY_HEADER_TYPES = {
    BINDING_REFRESH_REQUEST: 0,
    HOME_TEST_INIT: 1,
    CARE_OF_TEST_INIT: 2,
    HOME_TEST: 3,
    CARE_OF_TEST: 4,
    BINDING_UPDATE: 5,
    BINDING_ACKNOWLEDGEMENT: 6,
    BINDING_ERROR: 7,
} as const;

export type IPv6MobilityHeaderValues = {
    nextHeader: Protocol;
    mhType: number;
    /** message data following the checksum, including any mobility options */
    data: Uint8Array;
};

/**
 * Mobility header, the checksum is computed on encode over the pseudo-header of the preceding IPv6 header.
 * `data` must bring the header to a multiple of 8 octets.
 */
export class IPv6MobilityHeader implements ChainedHeader {
    static readonly PROTOCOL = PROTOCOLS.IPv6Mobility;

    static decode(buf: Uint8Array): Decoded<IPv6MobilityHeader> {
        assertLength(IPv6MobilityHeader.name, buf, PREFIX_LENGTH);

        let length = (buf[1] + 1) * 8;
        assertLength(IPv6MobilityHeader.name, buf, length);

        let hdr = IPV6_MOBILITY_HEADER.from(buf.subarray(0, length));
        if (!isProtocol(hdr.get("payloadProto"))) {
            throw new FormatError(IPv6MobilityHeader.name, "unassigned payload proto " + hdr.get("payloadProto"));
        }

        let mobility = new IPv6MobilityHeader({
            nextHeader: hdr.get("payloadProto"),
            mhType: hdr.get("mhType"),
            data: hdr.get("data"),
        });
        mobility.checksum = hdr.get("csum");

        return [mobility, length];
    }

    readonly kind = "ipv6-mobility";
    /** as decoded, encode computes its own */
    checksum = 0;
    data: Uint8Array;

    private _nextHeader: Protocol;
    private _mhType: number;

    constructor(values: Partial<IPv6MobilityHeaderValues> = {}) {
        this._nextHeader = assertProtocol("nextHeader", values.nextHeader ?? PROTOCOLS.IPv6NoNext);
        this._mhType = assertUint("mhType", values.mhType ?? MOBILITY_HEADER_TYPES.BINDING_REFRESH_REQUEST, 8);
        this.data = values.data ? new Uint8Array(values.data) : new Uint8Array(2);
    }

    /** the payload proto field, 59 unless a future extension defines otherwise */
    get nextHeader(): Protocol { return this._nextHeader; }
    set nextHeader(value: Protocol) { this._nextHeader = assertProtocol("nextHeader", value); }

    get mhType(): number { return this._mhType; }
    set mhType(value: number) { this._mhType = assertUint("mhType", value, 8); }

    get size(): number {
        return PREFIX_LENGTH + this.data.length;
    }

    encode(context?: EncodeContext): Uint8Array {
        if (this.size % 8 != 0) {
            throw new EncodeError(IPv6MobilityHeader.name, `${this.size} bytes is not a multiple of 8`);
        }

        let hdrLen = this.size / 8 - 1;
        if (hdrLen > 0xff) {
            throw new EncodeError(IPv6MobilityHeader.name, `${this.data.length} bytes of message data do not fit`);
        }

        let hdr = IPV6_MOBILITY_HEADER.create({
            payloadProto: this._nextHeader,
            hdrLen,
            mhType: this._mhType,
            csum: 0,
            data: this.data,
        });

        let ip = context && findPreceding(context, IPv6Header);
        if (ip) {
            hdr.set("csum", upperLayerChecksum(ip, PROTOCOLS.IPv6Mobility, hdr.getBuffer()));
        }

        return hdr.getBuffer();
    }

    equals(other: Header): boolean {
        return other instanceof IPv6MobilityHeader
            && this._nextHeader == other._nextHeader
            && this._mhType == other._mhType
            && uint8_equals(this.data, other.data);
    }

    clone(): IPv6MobilityHeader {
        let mobility = new IPv6MobilityHeader({ nextHeader: this._nextHeader, mhType: this._mhType, data: this.data });
        mobility.checksum = this.checksum;
        return mobility;
    }

    toString(): string {
        return `IPv6Mobility ${protocolName(this._nextHeader)} type=${this._mhType} ${uint8_toHex(this.data)}`;
    }
}
