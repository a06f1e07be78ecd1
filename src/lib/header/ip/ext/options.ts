import { defineStruct, SLICE, UINT8 } from "../../../binary/struct";
import { EncodeError, FormatError } from "../../../packet/errors";
import { assertProtocol, checkIndex, type IndexQuery } from "../../../packet/fields";
import { assertLength, type ChainedHeader, type Decoded, type Header } from "../../../packet/header";
import type { IPv6Option } from "../options/option";
import { decodeOptions, encodeOptions } from "../options/tlv";
import { isProtocol, type Protocol, protocolName, PROTOCOLS } from "../protocols";

export const IPV6_OPTIONS_HEADER = defineStruct({
    nextHeader: UINT8,
    /** length in 8-octet units, not including the first 8 octets */
    hdrExtLen: UINT8,
    options: SLICE,
});

const PREFIX_LENGTH = IPV6_OPTIONS_HEADER.getMinSize();

type OptionsHeaderClass<H extends IPv6OptionsHeader> = {
    name: string;
    new(options: readonly IPv6Option[], nextHeader: Protocol): H;
};

function decodeOptionsHeader<H extends IPv6OptionsHeader>(buf: Uint8Array, HeaderClass: OptionsHeaderClass<H>): Decoded<H> {
    assertLength(HeaderClass.name, buf, PREFIX_LENGTH);

    let nextHeader = buf[0], length = (buf[1] + 1) * 8;
    if (!isProtocol(nextHeader)) {
        throw new FormatError(HeaderClass.name, "unassigned next header " + nextHeader);
    }
    assertLength(HeaderClass.name, buf, length);

    let options = decodeOptions(buf.subarray(PREFIX_LENGTH, length), HeaderClass.name);
    return [new HeaderClass(options, nextHeader), length];
}

/**
 * Shared layout of the Hop-by-Hop and Destination Options headers, a next header code followed by TLV options.
 * The header owns its options, it never pads them; `encode` logs a warning when the result is not 8 octet aligned.
 */
export abstract class IPv6OptionsHeader implements ChainedHeader, Iterable<IPv6Option> {
    abstract readonly kind: "ipv6-hop-by-hop" | "ipv6-destination-options";

    private _nextHeader: Protocol;
    private _options: IPv6Option[];

    constructor(options: readonly IPv6Option[] = [], nextHeader: Protocol = PROTOCOLS.IPv6NoNext) {
        this._options = [...options];
        this._nextHeader = assertProtocol("nextHeader", nextHeader);
    }

    get nextHeader(): Protocol { return this._nextHeader; }
    set nextHeader(value: Protocol) { this._nextHeader = assertProtocol("nextHeader", value); }

    /** the number of options, not their size in bytes */
    get length(): number {
        return this._options.length;
    }

    get options(): readonly IPv6Option[] {
        return this._options;
    }

    get(index: IndexQuery): IPv6Option {
        return this._options[checkIndex(index, this._options.length)];
    }

    set(index: IndexQuery, option: IPv6Option): this {
        this._options[checkIndex(index, this._options.length)] = option;
        return this;
    }

    addOption(option: IPv6Option): this {
        this._options.push(option);
        return this;
    }

    /** inserts before the option currently at `index`, an index equal to the length appends */
    insertOption(index: number, option: IPv6Option): this {
        this._options.splice(checkIndex(index, this._options.length + 1), 0, option);
        return this;
    }

    removeOption(index: IndexQuery): IPv6Option {
        let [removed] = this._options.splice(checkIndex(index, this._options.length), 1);
        return removed;
    }

    [Symbol.iterator](): Iterator<IPv6Option> {
        return this._options[Symbol.iterator]();
    }

    get size(): number {
        return this._options.reduce((sum, option) => sum + option.size, PREFIX_LENGTH);
    }

    /** options not starting on their `xn+y` alignment, measured from the start of the header */
    misalignedOptions(): IPv6Option[] {
        let offset = PREFIX_LENGTH;
        let misaligned: IPv6Option[] = [];

        for (let option of this._options) {
            let [x, y] = option.alignment;
            if (offset % x != y) {
                misaligned.push(option);
            }
            offset += option.size;
        }

        return misaligned;
    }

    encode(): Uint8Array {
        let options = encodeOptions(this._options, PREFIX_LENGTH);
        // a misaligned header claims the whole 8 octet units it emits, never bytes past its end
        let hdrExtLen = Math.max(0, Math.floor((PREFIX_LENGTH + options.length) / 8) - 1);

        if (hdrExtLen > 0xff) {
            throw new EncodeError(this.constructor.name, `${options.length} bytes of options do not fit`);
        }

        return IPV6_OPTIONS_HEADER.create({
            nextHeader: this._nextHeader,
            hdrExtLen,
            options,
        }).getBuffer();
    }

    equals(other: Header): boolean {
        return other instanceof IPv6OptionsHeader
            && other.constructor === this.constructor
            && other._nextHeader == this._nextHeader
            && other._options.length == this._options.length
            && this._options.every((option, i) => option.equals(other._options[i]));
    }

    abstract clone(): IPv6OptionsHeader;

    protected cloneOptions(): IPv6Option[] {
        return this._options.map(option => option.clone());
    }

    toString(): string {
        return `${this.constructor.name} ${protocolName(this._nextHeader)} [${this._options.join(", ")}]`;
    }
}

/** <https://www.rfc-editor.org/rfc/rfc8200#section-4.3> */
export class IPv6HopByHopHeader extends IPv6OptionsHeader {
    static readonly PROTOCOL = PROTOCOLS.IPv6HopOption;

    static decode(buf: Uint8Array): Decoded<IPv6HopByHopHeader> {
        return decodeOptionsHeader(buf, IPv6HopByHopHeader);
    }

    readonly kind = "ipv6-hop-by-hop";

    clone(): IPv6HopByHopHeader {
        return new IPv6HopByHopHeader(this.cloneOptions(), this.nextHeader);
    }
}

/** <https://www.rfc-editor.org/rfc/rfc8200#section-4.6> */
export class IPv6DestinationOptionsHeader extends IPv6OptionsHeader {
    static readonly PROTOCOL = PROTOCOLS.IPv6DestinationOption;

    static decode(buf: Uint8Array): Decoded<IPv6DestinationOptionsHeader> {
        return decodeOptionsHeader(buf, IPv6DestinationOptionsHeader);
    }

    readonly kind = "ipv6-destination-options";

    clone(): IPv6DestinationOptionsHeader {
        return new IPv6DestinationOptionsHeader(this.cloneOptions(), this.nextHeader);
    }
}
