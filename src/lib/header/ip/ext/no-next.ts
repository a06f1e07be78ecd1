import type { Header } from "../../../packet/header";
import { PROTOCOLS } from "../protocols";

/**
 * Marker for protocol 59, nothing follows the header that names it.
 * It has no bytes on the wire, so decoding never produces one.
 */
export class IPv6NoNextHeader implements Header {
    static readonly PROTOCOL = PROTOCOLS.IPv6NoNext;

    readonly kind = "ipv6-no-next";

    get size(): number {
        return 0;
    }

    encode(): Uint8Array {
        return new Uint8Array(0);
    }

    equals(other: Header): boolean {
        return other instanceof IPv6NoNextHeader;
    }

    clone(): IPv6NoNextHeader {
        return new IPv6NoNextHeader();
    }

    toString(): string {
        return "IPv6NoNext";
    }
}
