import { StructValueError } from "../binary/struct";

/** malformed or truncated bytes during decode */
export class FormatError extends Error {
    constructor(public header: string, cause: string) {
        super(`cannot decode ${header}; ${cause}`);
        this.name = "FormatError";
    }
}

/** a value of the wrong kind was assigned to a typed field */
export class TypeMismatchError extends TypeError {
    constructor(public field: string, public value: unknown, expected: string) {
        super(`cannot set ${field}; expected ${expected} got ${describeValue(value)}`);
        this.name = "TypeMismatchError";
    }
}

/** an undefined code was assigned to an enumerated field */
export class EnumValueError extends StructValueError {
    constructor(public field: string, value: number) {
        super(`${value} is not a valid ${field}`, value);
        this.name = "EnumValueError";
    }
}

/** index outside of a header stack or option list */
export class IndexError extends RangeError {
    constructor(public index: number, length: number) {
        super(`index ${index} out of range [0, ${length})`);
        this.name = "IndexError";
    }
}

/** only scalar indices are supported, ranges and fractional indices are rejected */
export class ShapeError extends TypeError {
    constructor(query: unknown) {
        super(`indices must be integers, got ${describeValue(query)}`);
        this.name = "ShapeError";
    }
}

/** a header whose current field values cannot be laid out on the wire */
export class EncodeError extends Error {
    constructor(public header: string, cause: string) {
        super(`cannot encode ${header}; ${cause}`);
        this.name = "EncodeError";
    }
}

function describeValue(value: unknown): string {
    if (typeof value == "object" && value !== null) {
        return `${value.constructor.name}(${String(value)})`;
    }

    return JSON.stringify(value) ?? String(value);
}
