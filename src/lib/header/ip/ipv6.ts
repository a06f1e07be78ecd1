import type { BaseAddress } from "../../address/base";
import { IPV6Address, SPECIAL_IPV6_ADDRESSES } from "../../address/ipv6";
import { calculateChecksum } from "../../binary/checksum";
import { defineStruct, UINT8, UINT16, UINT32 } from "../../binary/struct";
import { IPV6_ADDRESS } from "../../struct-types/address";
import { EncodeError, FormatError } from "../../packet/errors";
import { assertProtocol, assertUint, toIPV6Address } from "../../packet/fields";
import { assertLength, payloadSize, type ChainedHeader, type Decoded, type EncodeContext, type Header } from "../../packet/header";
import { IPv6HopByHopHeader } from "./ext/options";
import { JumboPayload } from "./options/kinds";
import { isProtocol, type Protocol, protocolName, PROTOCOLS } from "./protocols";

export const IPV6_HEADER = defineStruct({
    version: UINT8(4),
    trafficClass: UINT8,
    flowLabel: UINT32(20),
    payloadLength: UINT16,
    nextHeader: UINT8,
    hopLimit: UINT8,
    saddr: IPV6_ADDRESS,
    daddr: IPV6_ADDRESS,
});

export const IPV6_PSEUDO_HEADER = defineStruct({
    saddr: IPV6_ADDRESS,
    daddr: IPV6_ADDRESS,
    len: UINT32,
    zeroes: UINT32(24),
    proto: UINT32(8),
});

const DEFAULT_HOP_LIMIT = 64;

function carriesJumboPayload(header: Header | undefined): boolean {
    return header instanceof IPv6HopByHopHeader
        && header.options.some(option => option instanceof JumboPayload);
}

export type IPv6HeaderValues = {
    trafficClass: number;
    flowLabel: number;
    /** informational, `Packet.toBytes` recomputes it from the headers that follow */
    payloadLength: number;
    nextHeader: Protocol;
    hopLimit: number;
    source: BaseAddress | string;
    destination: BaseAddress | string;
};

/** Fixed IPv6 header <https://www.rfc-editor.org/rfc/rfc8200#section-3> */
export class IPv6Header implements ChainedHeader {
    static readonly PROTOCOL = PROTOCOLS.IPv6;

    static decode(buf: Uint8Array): Decoded<IPv6Header> {
        assertLength(IPv6Header.name, buf, IPV6_HEADER.getMinSize());
        let hdr = IPV6_HEADER.from(buf);

        if (hdr.get("version") != 6) {
            throw new FormatError(IPv6Header.name, "version " + hdr.get("version"));
        }
        if (!isProtocol(hdr.get("nextHeader"))) {
            throw new FormatError(IPv6Header.name, "unassigned next header " + hdr.get("nextHeader"));
        }

        return [new IPv6Header({
            trafficClass: hdr.get("trafficClass"),
            flowLabel: hdr.get("flowLabel"),
            payloadLength: hdr.get("payloadLength"),
            nextHeader: hdr.get("nextHeader"),
            hopLimit: hdr.get("hopLimit"),
            source: hdr.get("saddr"),
            destination: hdr.get("daddr"),
        }), hdr.size];
    }

    readonly kind = "ipv6";
    payloadLength: number;

    private _trafficClass: number;
    private _flowLabel: number;
    private _nextHeader: Protocol;
    private _hopLimit: number;
    private _source: IPV6Address;
    private _destination: IPV6Address;

    constructor(values: Partial<IPv6HeaderValues> = {}) {
        this._trafficClass = assertUint("trafficClass", values.trafficClass ?? 0, 8);
        this._flowLabel = assertUint("flowLabel", values.flowLabel ?? 0, 20);
        this._nextHeader = assertProtocol("nextHeader", values.nextHeader ?? PROTOCOLS.IPv6NoNext);
        this._hopLimit = assertUint("hopLimit", values.hopLimit ?? DEFAULT_HOP_LIMIT, 8);
        this._source = toIPV6Address("source", values.source ?? SPECIAL_IPV6_ADDRESSES.UNSPECIFIED);
        this._destination = toIPV6Address("destination", values.destination ?? SPECIAL_IPV6_ADDRESSES.UNSPECIFIED);
        this.payloadLength = assertUint("payloadLength", values.payloadLength ?? 0, 16);
    }

    get trafficClass(): number { return this._trafficClass; }
    set trafficClass(value: number) { this._trafficClass = assertUint("trafficClass", value, 8); }

    get flowLabel(): number { return this._flowLabel; }
    set flowLabel(value: number) { this._flowLabel = assertUint("flowLabel", value, 20); }

    get nextHeader(): Protocol { return this._nextHeader; }
    set nextHeader(value: Protocol) { this._nextHeader = assertProtocol("nextHeader", value); }

    get hopLimit(): number { return this._hopLimit; }
    set hopLimit(value: number) { this._hopLimit = assertUint("hopLimit", value, 8); }

    get source(): IPV6Address { return this._source; }
    set source(value: BaseAddress | string) { this._source = toIPV6Address("source", value); }

    get destination(): IPV6Address { return this._destination; }
    set destination(value: BaseAddress | string) { this._destination = toIPV6Address("destination", value); }

    get size(): number {
        return IPV6_HEADER.getMinSize();
    }

    encode(context?: EncodeContext): Uint8Array {
        let payloadLength = context ? payloadSize(context) : this.payloadLength;
        if (payloadLength > 0xffff) {
            // jumbogram, the length travels in a Jumbo Payload option of the hop-by-hop header that follows
            if (!context || !carriesJumboPayload(context.headers[context.index + 1])) {
                throw new EncodeError(IPv6Header.name, `payload of ${payloadLength} bytes without a Jumbo Payload option`);
            }
            payloadLength = 0;
        }

        return IPV6_HEADER.create({
            version: 6,
            trafficClass: this._trafficClass,
            flowLabel: this._flowLabel,
            payloadLength,
            nextHeader: this._nextHeader,
            hopLimit: this._hopLimit,
            saddr: this._source,
            daddr: this._destination,
        }).getBuffer();
    }

    equals(other: Header): boolean {
        return other instanceof IPv6Header
            && this._trafficClass == other._trafficClass
            && this._flowLabel == other._flowLabel
            && this._nextHeader == other._nextHeader
            && this._hopLimit == other._hopLimit
            && this._source.equals(other._source)
            && this._destination.equals(other._destination);
    }

    clone(): IPv6Header {
        return new IPv6Header({
            trafficClass: this._trafficClass,
            flowLabel: this._flowLabel,
            payloadLength: this.payloadLength,
            nextHeader: this._nextHeader,
            hopLimit: this._hopLimit,
            source: this._source,
            destination: this._destination,
        });
    }

    toString(): string {
        return `IPv6 ${this._source}->${this._destination} ${protocolName(this._nextHeader)} hlim=${this._hopLimit}`;
    }
}

/**
 * Checksum of an upper-layer message carried by `ip`, computed over the IPv6 pseudo-header
 * <https://www.rfc-editor.org/rfc/rfc8200#section-8.1>
 * @param message the message bytes with the checksum field zeroed
 */
export function upperLayerChecksum(ip: IPv6Header, proto: Protocol, message: Uint8Array): number {
    let pseudo = IPV6_PSEUDO_HEADER.create({
        saddr: ip.source,
        daddr: ip.destination,
        len: message.length,
        proto,
    });

    return calculateChecksum(pseudo.getBuffer(), message);
}
