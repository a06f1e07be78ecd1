import { addressEquals, type BaseAddress } from "./base";

const POSSIBLE_SEPARATOR = ["-", ":", "."] as const;
const SEPARATOR_REGEX = new RegExp(`[${POSSIBLE_SEPARATOR.join("")}]`, "g");

export class MACAddress implements BaseAddress {
    static ADDRESS_LENGTH = 48;
    static parse(input: string): Uint8Array {
        let buffer = new Uint8Array(MACAddress.ADDRESS_LENGTH / 8);
        input = input.replace(SEPARATOR_REGEX, "").trim();

        if (!/^[0-9a-fA-F]{12}$/.test(input)) {
            throw new Error("cannot parse: " + input);
        }

        for (let i = 0; i < buffer.length; i++) {
            buffer[i] = parseInt(input.substring(i * 2, i * 2 + 2), 16);
        }

        return buffer;
    }

    buffer: Uint8Array;

    constructor(input: string | Uint8Array | MACAddress) {
        if (typeof input == "string") {
            this.buffer = MACAddress.parse(input);
        } else if (input instanceof MACAddress) {
            this.buffer = new Uint8Array(input.buffer);
        } else if (input instanceof Uint8Array && (input.length * 8) == MACAddress.ADDRESS_LENGTH) {
            this.buffer = new Uint8Array(input);
        } else {
            throw new Error("failed to initialize: " + MACAddress.name);
        }
    }

    toString(separator: typeof POSSIBLE_SEPARATOR[number] = ":") {
        return [...this.buffer].map(n => n.toString(16).padStart(2, "0")).join(separator);
    }

    equals(other: BaseAddress): boolean {
        return addressEquals(this, other);
    }

    isMulticast(): boolean {
        // 8th bit
        return (this.buffer[0] & 1) == 1;
    }

    isBroadcast(): boolean {
        return this.buffer.every(n => n == 0xff);
    }
}
