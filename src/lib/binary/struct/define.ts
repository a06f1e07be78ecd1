import { Struct, type StructType, type StructTypes } from "./struct";

export function defineStruct<Values extends Record<string, unknown>>(input: StructTypes<Values>) {
    return new Struct<Values>(input);
}

/** a value type that can be narrowed to fewer bits by calling it, ie. `UINT16(13)` */
export type SizedStructType<T> = StructType<T> & ((bitLength: number) => SizedStructType<T>);

export function defineStructType<T>(input: StructType<T>): SizedStructType<T> {
    let resize = (bitLength: number): SizedStructType<T> => {
        if (input.bitLength < bitLength) {
            throw new Error(`cannot define, bitLength "${bitLength}" is larger than type size "${input.bitLength}".`);
        }

        return defineStructType<T>({
            bitLength,
            getter: input.getter,
            setter: input.setter,
        });
    };

    return Object.assign(resize, {
        bitLength: input.bitLength,
        getter: input.getter,
        setter: input.setter,
    });
}
