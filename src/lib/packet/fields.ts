import type { BaseAddress } from "../address/base";
import { IPV4Address } from "../address/ipv4";
import { IPV6Address } from "../address/ipv6";
import { StructValueError } from "../binary/struct";
import { isProtocol } from "../header/ip/protocols";
import { EnumValueError, IndexError, ShapeError, TypeMismatchError } from "./errors";

/** scalar position into a header stack or option list, a `[start, end]` range is rejected */
export type IndexQuery = number | readonly [start?: number, end?: number];

/** validates an index query against a sequence of `length` items */
export function checkIndex(query: IndexQuery, length: number): number {
    if (typeof query != "number" || !Number.isInteger(query)) {
        throw new ShapeError(query);
    }

    if (query < 0 || query >= length) {
        throw new IndexError(query, length);
    }

    return query;
}

export function assertUint(field: string, value: number, bitLength: number): number {
    if (typeof value != "number") {
        throw new TypeMismatchError(field, value, "number");
    }

    if (!Number.isInteger(value) || value < 0 || value >= 2 ** bitLength) {
        throw new StructValueError(`${field} must be an unsigned ${bitLength} bit integer`, value);
    }

    return value;
}

export function assertProtocol(field: string, value: number): number {
    if (typeof value != "number") {
        throw new TypeMismatchError(field, value, "protocol number");
    }

    if (!isProtocol(value)) {
        throw new EnumValueError(field, value);
    }

    return value;
}

/**
 * Converts an assignment to an IPv6 address field.
 * Anything that is not an IPv6 address, ie. an `IPV4Address` or "10.0.0.1", fails instead of being truncated or padded.
 */
export function toIPV6Address(field: string, value: BaseAddress | string): IPV6Address {
    if (value instanceof IPV6Address) {
        return new IPV6Address(value);
    }

    if (typeof value == "string" && !IPV4Address.validate(value) && IPV6Address.validate(value)) {
        return new IPV6Address(value);
    }

    throw new TypeMismatchError(field, value, IPV6Address.name);
}
