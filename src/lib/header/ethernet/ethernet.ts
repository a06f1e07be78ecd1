import { MACAddress } from "../../address/mac";
import { defineStruct, UINT16 } from "../../binary/struct";
import { MAC_ADDRESS } from "../../struct-types/address";
import { TypeMismatchError } from "../../packet/errors";
import { assertUint } from "../../packet/fields";
import { assertLength, type Decoded, type Header } from "../../packet/header";
import { ETHER_TYPES, type EtherType } from "./types";

/** 
Source: <https://en.wikipedia.org/wiki/Ethernet_frame>
*/
export const ETHERNET_HEADER = defineStruct({
    dmac: MAC_ADDRESS,
    smac: MAC_ADDRESS,
    ethertype: UINT16,
});

export type EthernetHeaderValues = {
    destination: MACAddress | string;
    source: MACAddress | string;
    ethertype: EtherType;
};

function toMACAddress(field: string, value: MACAddress | string): MACAddress {
    if (value instanceof MACAddress) {
        return new MACAddress(value);
    }

    try {
        return new MACAddress(value);
    } catch {
        throw new TypeMismatchError(field, value, MACAddress.name);
    }
}

/** Link layer framing, the core only chains past it on `ethertype` */
export class EthernetHeader implements Header {
    static decode(buf: Uint8Array): Decoded<EthernetHeader> {
        assertLength(EthernetHeader.name, buf, ETHERNET_HEADER.getMinSize());
        let hdr = ETHERNET_HEADER.from(buf);

        return [new EthernetHeader({
            destination: hdr.get("dmac"),
            source: hdr.get("smac"),
            ethertype: hdr.get("ethertype"),
        }), hdr.size];
    }

    readonly kind = "ethernet";

    private _destination: MACAddress;
    private _source: MACAddress;
    private _ethertype: EtherType;

    constructor(values: Partial<EthernetHeaderValues> = {}) {
        this._destination = toMACAddress("destination", values.destination ?? "00:00:00:00:00:00");
        this._source = toMACAddress("source", values.source ?? "00:00:00:00:00:00");
        this._ethertype = assertUint("ethertype", values.ethertype ?? ETHER_TYPES.IPv4, 16);
    }

    get destination(): MACAddress { return this._destination; }
    set destination(value: MACAddress | string) { this._destination = toMACAddress("destination", value); }

    get source(): MACAddress { return this._source; }
    set source(value: MACAddress | string) { this._source = toMACAddress("source", value); }

    get ethertype(): EtherType { return this._ethertype; }
    set ethertype(value: EtherType) { this._ethertype = assertUint("ethertype", value, 16); }

    get size(): number {
        return ETHERNET_HEADER.getMinSize();
    }

    encode(): Uint8Array {
        return ETHERNET_HEADER.create({
            dmac: this._destination,
            smac: this._source,
            ethertype: this._ethertype,
        }).getBuffer();
    }

    equals(other: Header): boolean {
        return other instanceof EthernetHeader
            && this._destination.equals(other._destination)
            && this._source.equals(other._source)
            && this._ethertype == other._ethertype;
    }

    clone(): EthernetHeader {
        return new EthernetHeader({
            destination: this._destination,
            source: this._source,
            ethertype: this._ethertype,
        });
    }

    toString(): string {
        return `Ethernet ${this._source}->${this._destination} 0x${this._ethertype.toString(16).padStart(4, "0")}`;
    }
}
