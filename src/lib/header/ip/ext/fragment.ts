import { defineStruct, UINT8, UINT16, UINT32 } from "../../../binary/struct";
import { FormatError } from "../../../packet/errors";
import { assertProtocol, assertUint } from "../../../packet/fields";
import { assertLength, type ChainedHeader, type Decoded, type Header } from "../../../packet/header";
import { isProtocol, type Protocol, protocolName, PROTOCOLS } from "../protocols";

/** <https://www.rfc-editor.org/rfc/rfc8200#section-4.5> */
export const IPV6_FRAGMENT_HEADER = defineStruct({
    nextHeader: UINT8,
    reserved: UINT8,
    /** in 8-octet units */
    offset: UINT16(13),
    res: UINT16(2),
    mf: UINT16(1),
    id: UINT32,
});

export class IPv6FragmentHeader implements ChainedHeader {
    static readonly PROTOCOL = PROTOCOLS.IPv6Fragment;

    static decode(buf: Uint8Array): Decoded<IPv6FragmentHeader> {
        assertLength(IPv6FragmentHeader.name, buf, IPV6_FRAGMENT_HEADER.getMinSize());
        let hdr = IPV6_FRAGMENT_HEADER.from(buf);

        if (!isProtocol(hdr.get("nextHeader"))) {
            throw new FormatError(IPv6FragmentHeader.name, "unassigned next header " + hdr.get("nextHeader"));
        }

        return [new IPv6FragmentHeader(hdr.get("id"), hdr.get("offset"), hdr.get("mf") == 1, hdr.get("nextHeader")), hdr.size];
    }

    readonly kind = "ipv6-fragment";

    private _nextHeader: Protocol;
    private _id: number;
    private _offset: number;
    private _mf: boolean;

    constructor(id: number = 0, offset: number = 0, mf: boolean = false, nextHeader: Protocol = PROTOCOLS.IPv6NoNext) {
        this._id = assertUint("id", id, 32);
        this._offset = assertUint("offset", offset, 13);
        this._mf = mf;
        this._nextHeader = assertProtocol("nextHeader", nextHeader);
    }

    get nextHeader(): Protocol { return this._nextHeader; }
    set nextHeader(value: Protocol) { this._nextHeader = assertProtocol("nextHeader", value); }

    get id(): number { return this._id; }
    set id(value: number) { this._id = assertUint("id", value, 32); }

    get offset(): number { return this._offset; }
    set offset(value: number) { this._offset = assertUint("offset", value, 13); }

    /** more fragments follow */
    get mf(): boolean { return this._mf; }
    set mf(value: boolean) { this._mf = value; }

    get size(): number {
        return IPV6_FRAGMENT_HEADER.getMinSize();
    }

    encode(): Uint8Array {
        return IPV6_FRAGMENT_HEADER.create({
            nextHeader: this._nextHeader,
            offset: this._offset,
            mf: this._mf ? 1 : 0,
            id: this._id,
        }).getBuffer();
    }

    equals(other: Header): boolean {
        return other instanceof IPv6FragmentHeader
            && this._nextHeader == other._nextHeader
            && this._id == other._id
            && this._offset == other._offset
            && this._mf == other._mf;
    }

    clone(): IPv6FragmentHeader {
        return new IPv6FragmentHeader(this._id, this._offset, this._mf, this._nextHeader);
    }

    toString(): string {
        return `IPv6Fragment ${protocolName(this._nextHeader)} id=${this._id} offset=${this._offset}${this._mf ? " MF" : ""}`;
    }
}
