import { StructValueError } from "./struct";
import { defineStructType } from "./define";
import { uint8_fromNumber, uint8_readUint } from "../uint8-array";

function defineUINT(bitLength: number) {
    return defineStructType<number>({
        bitLength: bitLength,
        setter(v) {
            if (!Number.isInteger(v) || v < 0) {
                throw new StructValueError("value must be a positive integer", v);
            }
            if (v >= 2 ** bitLength) {
                throw new StructValueError("value does not fit in bits", v);
            }

            return uint8_fromNumber(v, Math.ceil(bitLength / 8));
        },
        getter(buf) {
            return uint8_readUint(buf);
        }
    });
}

export const UINT8 = defineUINT(8);
export const UINT16 = defineUINT(16);
export const UINT32 = defineUINT(32);

export const SLICE = defineStructType<Uint8Array>({
    bitLength: -1,
    getter: buf => buf,
    setter: buf => buf,
});

export const BYTE_ARRAY = (length: number) => defineStructType<Uint8Array>({
    bitLength: length * 8,
    getter: buf => buf,
    setter(buf) {
        if (buf.length != length) {
            throw new StructValueError(`expected ${length} bytes`, buf);
        }
        return buf;
    },
});
