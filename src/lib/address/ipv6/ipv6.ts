import { addressEquals, type BaseAddress } from "../base";
import { ADDRESS_TYPESV6 } from "./reserved";

const HEX_GROUP_REGEX = /^[0-9a-f]{1,4}$/;

export class IPV6Address implements BaseAddress {
    static ADDRESS_LENGTH: number = 128;
    static parse(input: string): Uint8Array {
        input = input.toLowerCase().trim();
        let halves = input.split("::");

        if (halves.length > 2) {
            throw new Error("cannot parse: " + input);
        }

        let head = halves[0] ? halves[0].split(":") : [],
            tail = halves[1] ? halves[1].split(":") : [],
            groups = head;

        if (halves.length == 2) {
            // "::" stands in for at least one group of zeroes
            let missingCount = 8 - head.length - tail.length;
            if (missingCount < 1) {
                throw new Error("cannot parse: " + input);
            }
            groups = [...head, ...new Array<string>(missingCount).fill("0"), ...tail];
        }

        if (groups.length != 8 || !groups.every(group => HEX_GROUP_REGEX.test(group))) {
            throw new Error("cannot parse: " + input);
        }

        let buffer = new Uint8Array(IPV6Address.ADDRESS_LENGTH / 8);
        for (let i = 0; i < 8; i++) {
            let n = parseInt(groups[i], 16);
            buffer[i * 2] = n >>> 8;
            buffer[i * 2 + 1] = n & 0xff;
        }

        return buffer;
    }
    static validate(input: unknown): boolean {
        if (typeof input != "string") {
            return false;
        }

        try {
            IPV6Address.parse(input);
            return true;
        } catch {
            return false;
        }
    }

    buffer: Uint8Array;

    constructor(input: string | Uint8Array | IPV6Address) {
        if (typeof input == "string") {
            this.buffer = IPV6Address.parse(input);
        } else if (input instanceof IPV6Address) {
            this.buffer = new Uint8Array(input.buffer);
        } else if (input instanceof Uint8Array && input.length == IPV6Address.ADDRESS_LENGTH / 8) {
            this.buffer = new Uint8Array(input);
        } else {
            throw new Error("failed to initialize: " + IPV6Address.name);
        }
    }

    /**
     * (-1) No shortening;
     * (0) Remove leading zeroes;
     * (4) Remove leading zeroes and the longest run of zero groups;
     */
    toString(simplify: -1 | 0 | 4 = 4): string {
        let groups = new Array<number>(8);
        for (let i = 0; i < 8; i++) {
            groups[i] = (this.buffer[i * 2] << 8) | this.buffer[i * 2 + 1];
        }

        if (simplify < 0) {
            return groups.map(n => n.toString(16).padStart(4, "0")).join(":");
        }

        let a = groups.map(n => n.toString(16));
        if (simplify < 4) {
            return a.join(":");
        }

        // find the longest run of zero groups, a single group is not compressed
        let bestStart = -1, bestLength = 1;
        for (let i = 0; i < 8; i++) {
            let len = 0;
            while (i + len < 8 && groups[i + len] == 0) len++;

            if (len > bestLength) {
                bestStart = i;
                bestLength = len;
            }
            i += len;
        }

        if (bestStart < 0) {
            return a.join(":");
        }

        return a.slice(0, bestStart).join(":") + "::" + a.slice(bestStart + bestLength).join(":");
    }

    equals(other: BaseAddress): boolean {
        return addressEquals(this, other);
    }

    isUnspecified(): boolean {
        return this.matchesPrefix(ADDRESS_TYPESV6.UNSPECIFIED);
    }

    isLoopback(): boolean {
        return this.matchesPrefix(ADDRESS_TYPESV6.LOOPBACK);
    }

    isLinkLocal(): boolean {
        return this.matchesPrefix(ADDRESS_TYPESV6.LINK_LOCAL);
    }

    isMulticast(): boolean {
        return this.matchesPrefix(ADDRESS_TYPESV6.MULTICAST);
    }

    private matchesPrefix([network, length]: readonly [string, number]): boolean {
        let prefix = IPV6Address.parse(network);

        for (let bit = 0; bit < length; bit++) {
            let mask = 0x80 >>> (bit & 7);
            if ((prefix[bit >>> 3] & mask) != (this.buffer[bit >>> 3] & mask)) {
                return false;
            }
        }

        return true;
    }

    toJSON(): { type: string; address: string } {
        return {
            type: this.constructor.name,
            address: this.toString(),
        };
    }
}
