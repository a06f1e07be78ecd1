import type { BaseAddress } from "../address/base";
import { IPV4Address } from "../address/ipv4";
import { IPV6Address } from "../address/ipv6";
import { MACAddress } from "../address/mac";
import type { StructType } from "../binary/struct";
import { TypeMismatchError } from "../packet/errors";

type AddressClass<A extends BaseAddress> = {
    ADDRESS_LENGTH: number;
    name: string;
    new(input: Uint8Array): A;
};

export const defineAddress = <A extends BaseAddress>(Address: AddressClass<A>): StructType<A> => {
    return {
        bitLength: Address.ADDRESS_LENGTH,
        getter(buffer) {
            return new Address(buffer);
        },
        setter(value) {
            // the struct only checks the width, a 4 byte address fits in 128 bits
            if (!(value instanceof Address)) {
                throw new TypeMismatchError("address", value, Address.name);
            }
            return value.buffer;
        },
    };
};

export const IPV4_ADDRESS = defineAddress(IPV4Address);
export const IPV6_ADDRESS = defineAddress(IPV6Address);
export const MAC_ADDRESS = defineAddress(MACAddress);
