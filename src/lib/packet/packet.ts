import { uint8_concat } from "../binary/uint8-array";
import { EthernetHeader } from "../header/ethernet";
import { IPv6HopByHopHeader } from "../header/ip/ext";
import { IPv6Header } from "../header/ip/ipv6";
import { JumboPayload } from "../header/ip/options";
import { PROTOCOLS } from "../header/ip/protocols";
import { RawPayload } from "../header/raw";
import { nextDecoder, type ChainDecoder, type PacketHeader } from "./chain";
import { FormatError, TypeMismatchError } from "./errors";
import { checkIndex, type IndexQuery } from "./fields";
import type { Header, HeaderDecoder } from "./header";

function withoutNoNext(headers: readonly PacketHeader[]): readonly PacketHeader[] {
    let length = headers.length;
    while (length > 0 && headers[length - 1].kind == "ipv6-no-next") {
        length--;
    }

    return headers.slice(0, length);
}

type HeaderClass<H extends Header> = abstract new (...args: never[]) => H;

export type PacketDecodeOptions = {
    /** decoder for the first header in the buffer */
    firstHeader: HeaderDecoder<PacketHeader>;
    /** fail when an IPv6 payload length runs past the end of the buffer, or is 0 without a Jumbo Payload option, instead of taking what is there */
    strictPayloadLength: boolean;
};

const DEFAULT_DECODE_OPTIONS: PacketDecodeOptions = {
    firstHeader: EthernetHeader,
    strictPayloadLength: false,
};

export type PacketResult = {
    success: true;
    data: Packet;
} | {
    success: false;
    error: Error;
};

/**
 * Ordered stack of headers, outermost first.
 * Chaining is the callers job: inserting or replacing a header never touches a `nextHeader` field.
 */
export class Packet implements Iterable<PacketHeader> {
    /** decodes `raw` front to back following each header's next header code */
    static from(raw: Uint8Array, options: Partial<PacketDecodeOptions> = {}): Packet {
        let { firstHeader, strictPayloadLength } = { ...DEFAULT_DECODE_OPTIONS, ...options };

        let packet = new Packet();
        let decoder: ChainDecoder = firstHeader;
        let p = 0, end = raw.length;
        // start of a payload whose length is carried by a Jumbo Payload option
        let jumboStart: number | undefined;

        let bound = (start: number, length: number) => {
            if (start + length > end && strictPayloadLength) {
                throw new FormatError(IPv6Header.name, `payload length ${length} exceeds the ${end - start} bytes left`);
            }
            end = Math.min(end, start + length);
        };

        for (;;) {
            // bytes past the last header are padding, no header claims them
            if (decoder == "end") {
                break;
            }

            let rest = raw.subarray(p, Math.max(p, end));

            if (decoder === RawPayload) {
                // nothing is appended for an empty remainder
                if (rest.length > 0) {
                    packet.add(new RawPayload(rest));
                }
                break;
            }

            let [header, consumed] = decoder.decode(rest);
            packet.add(header);
            p += consumed;

            if (header instanceof IPv6Header) {
                if (header.payloadLength > 0) {
                    bound(p, header.payloadLength);
                } else if (header.nextHeader == PROTOCOLS.IPv6HopOption) {
                    jumboStart = p;
                } else {
                    end = p;
                }
            } else if (header instanceof IPv6HopByHopHeader && jumboStart !== undefined) {
                let jumbo = header.options.find((option): option is JumboPayload => option instanceof JumboPayload);

                if (jumbo) {
                    bound(jumboStart, jumbo.payloadLength);
                } else if (strictPayloadLength) {
                    throw new FormatError(IPv6Header.name, "payload length 0 without a Jumbo Payload option");
                } else {
                    end = p;
                }
                jumboStart = undefined;
            }

            decoder = nextDecoder(header);
        }

        return packet;
    }

    /** `from` returning the error instead of throwing it */
    static tryFrom(raw: Uint8Array, options: Partial<PacketDecodeOptions> = {}): PacketResult {
        try {
            return { success: true, data: Packet.from(raw, options) };
        } catch (error) {
            if (error instanceof Error) {
                return { success: false, error };
            }
            throw error;
        }
    }

    private headers: PacketHeader[];

    constructor(...headers: PacketHeader[]) {
        this.headers = headers;
    }

    add(header: PacketHeader): this {
        this.headers.push(header);
        return this;
    }

    /** a new packet with the headers of this one followed by `other`, the headers themselves are shared */
    concat(other: Packet | PacketHeader): Packet {
        let tail = other instanceof Packet ? other.headers : [other];
        return new Packet(...this.headers, ...tail);
    }

    /** inserts before the header currently at `index`, an index equal to the length appends */
    insertHeader(index: number, header: PacketHeader): this {
        this.headers.splice(checkIndex(index, this.headers.length + 1), 0, header);
        return this;
    }

    /** index of the first header that is an instance of `HeaderClass`, -1 if there is none */
    getHeaderIndex(HeaderClass: HeaderClass<Header>, startIndex: number = 0): number {
        for (let i = startIndex; i < this.headers.length; i++) {
            if (this.headers[i] instanceof HeaderClass) {
                return i;
            }
        }

        return -1;
    }

    getHeader<H extends Header>(HeaderClass: HeaderClass<H>): H | undefined {
        for (let header of this.headers) {
            if (header instanceof HeaderClass) {
                return header;
            }
        }

        return undefined;
    }

    get(index: IndexQuery): PacketHeader;
    get<H extends Header>(index: IndexQuery, HeaderClass: HeaderClass<H>): H;
    get<H extends Header>(index: IndexQuery, HeaderClass?: HeaderClass<H>): PacketHeader | H {
        let header = this.headers[checkIndex(index, this.headers.length)];

        if (!HeaderClass) {
            return header;
        }
        if (!(header instanceof HeaderClass)) {
            throw new TypeMismatchError(`headers[${index}]`, header, HeaderClass.name);
        }

        return header;
    }

    set(index: IndexQuery, header: PacketHeader): this {
        this.headers[checkIndex(index, this.headers.length)] = header;
        return this;
    }

    delete(index: IndexQuery): PacketHeader {
        let [removed] = this.headers.splice(checkIndex(index, this.headers.length), 1);
        return removed;
    }

    numHeaders(): number {
        return this.headers.length;
    }

    get length(): number {
        return this.headers.length;
    }

    [Symbol.iterator](): Iterator<PacketHeader> {
        return this.headers[Symbol.iterator]();
    }

    /** the number of bytes `toBytes` produces */
    get size(): number {
        return this.headers.reduce((sum, { size }) => sum + size, 0);
    }

    toBytes(): Uint8Array {
        let headers: readonly Header[] = this.headers;
        return uint8_concat(headers.map((header, index) => header.encode({ headers, index })));
    }

    /** a trailing `IPv6NoNextHeader` has no bytes, so it takes no part in the comparison */
    equals(other: Packet): boolean {
        let headers = withoutNoNext(this.headers), otherHeaders = withoutNoNext(other.headers);

        return otherHeaders.length == headers.length
            && headers.every((header, i) => header.equals(otherHeaders[i]));
    }

    clone(): Packet {
        return new Packet(...this.headers.map(header => header.clone()));
    }

    toString(): string {
        return this.headers.join(" | ");
    }
}
