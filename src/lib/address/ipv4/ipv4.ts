import { addressEquals, type BaseAddress } from "../base";

const DOT_NOTATED_ADDRESS_REGEX = /^(\b25[0-5]|\b2[0-4][0-9]|\b[01]?[0-9][0-9]?)(\.(25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)){3}$/;

export class IPV4Address implements BaseAddress {
    static ADDRESS_LENGTH: number = 32;
    static parse(input: string): Uint8Array {
        input = input.trim();
        if (!DOT_NOTATED_ADDRESS_REGEX.test(input)) {
            throw new Error("failed to parse: " + IPV4Address.name);
        }

        return new Uint8Array(input.split(".").map(n => parseInt(n, 10)));
    }
    static validate(input: unknown): boolean {
        return typeof input == "string" && DOT_NOTATED_ADDRESS_REGEX.test(input.trim());
    }

    buffer: Uint8Array;

    constructor(input: string | Uint8Array | IPV4Address) {
        if (typeof input == "string") {
            this.buffer = IPV4Address.parse(input);
        } else if (input instanceof IPV4Address) {
            this.buffer = new Uint8Array(input.buffer);
        } else if (input instanceof Uint8Array && (input.length * 8) == IPV4Address.ADDRESS_LENGTH) {
            this.buffer = new Uint8Array(input);
        } else {
            throw new Error("failed to initialize: " + IPV4Address.name);
        }
    }

    toString(): string {
        return this.buffer.join(".");
    }

    equals(other: BaseAddress): boolean {
        return addressEquals(this, other);
    }

    toJSON(): { type: string; address: string } {
        return {
            type: this.constructor.name,
            address: this.toString(),
        };
    }
}
