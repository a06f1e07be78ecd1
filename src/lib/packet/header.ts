import { FormatError } from "./errors";

/** where a header sits in the packet being encoded */
export interface EncodeContext {
    /** every header of the packet, in wire order */
    headers: readonly Header[];
    /** position of the header being encoded */
    index: number;
}

export type Decoded<H extends Header> = [header: H, consumed: number];

export interface HeaderDecoder<H extends Header = Header> {
    readonly name: string;
    decode(buf: Uint8Array): Decoded<H>;
}

export interface Header {
    readonly kind: string;
    /** the number of bytes `encode` produces */
    readonly size: number;
    encode(context?: EncodeContext): Uint8Array;
    equals(other: Header): boolean;
    clone(): Header;
    toString(): string;
}

/** a header that names the protocol of the header following it */
export interface ChainedHeader extends Header {
    nextHeader: number;
}

/** sum of the declared sizes of every header after the one being encoded */
export function payloadSize({ headers, index }: EncodeContext): number {
    return headers.slice(index + 1).reduce((sum, { size }) => sum + size, 0);
}

/** the closest header before the one being encoded that is an instance of `HeaderClass` */
export function findPreceding<H extends Header>(
    { headers, index }: EncodeContext,
    HeaderClass: abstract new (...args: never[]) => H
): H | undefined {
    for (let i = index - 1; i >= 0; i--) {
        let header = headers[i];
        if (header instanceof HeaderClass) {
            return header;
        }
    }

    return undefined;
}

export function assertLength(header: string, buf: Uint8Array, length: number) {
    if (buf.length < length) {
        throw new FormatError(header, `expected at least ${length} bytes got ${buf.length}`);
    }
}
