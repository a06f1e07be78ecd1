import { IPV6Address } from "../../../address/ipv6";
import { uint8_concat, uint8_readUint } from "../../../binary/uint8-array";
import { FormatError } from "../../../packet/errors";
import { HomeAddress, JumboPayload, RouterAlert, TunnelEncapsulationLimit } from "./kinds";
import { type IPv6Option, IPV6_OPTION_TYPES, MAX_OPTION_DATA_LENGTH, Pad1, PadN, UnknownOption } from "./option";

export const ALIGNMENT_WARNING = "not an even multiple of 8";

type OptionDecoder = {
    /** exact length of the value, undefined if any length is accepted */
    length?: number;
    decode(data: Uint8Array): IPv6Option;
};

const OPTION_DECODERS: Record<number, OptionDecoder> = {
    [IPV6_OPTION_TYPES.PADN]: { decode: data => new PadN(data.length + 2) },
    [IPV6_OPTION_TYPES.TUNNEL_ENCAPSULATION_LIMIT]: { length: 1, decode: data => new TunnelEncapsulationLimit(data[0]) },
    [IPV6_OPTION_TYPES.ROUTER_ALERT]: { length: 2, decode: data => new RouterAlert(uint8_readUint(data)) },
    [IPV6_OPTION_TYPES.JUMBO_PAYLOAD]: { length: 4, decode: data => new JumboPayload(uint8_readUint(data)) },
    [IPV6_OPTION_TYPES.HOME_ADDRESS]: { length: 16, decode: data => new HomeAddress(new IPV6Address(data)) },
};

/**
 * Concatenates the encoding of every option.
 * Padding is the callers job, when the header would not end on an 8 octet boundary a warning is logged and the bytes are returned as is.
 * @param prefixLength bytes of the header in front of the options
 */
export function encodeOptions(options: readonly IPv6Option[], prefixLength: number = 2): Uint8Array {
    let bytes = uint8_concat(options.map(option => option.encode()));
    let length = prefixLength + bytes.length;

    if (length % 8 != 0) {
        console.warn(`Size of IPv6 options header (${length} bytes) is ${ALIGNMENT_WARNING}`);
    }

    return bytes;
}

/** reads options until `buf` is exhausted */
export function decodeOptions(buf: Uint8Array, header: string = "IPv6 options"): IPv6Option[] {
    let options: IPv6Option[] = [];
    let p = 0;

    while (p < buf.length) {
        let type = buf[p];

        if (type == IPV6_OPTION_TYPES.PAD1) {
            options.push(new Pad1());
            p++;
            continue;
        }

        if (p + 2 > buf.length) {
            throw new FormatError(header, `option ${type} at offset ${p} is missing its length`);
        }

        let len = buf[p + 1],
            data = buf.subarray(p + 2, p + 2 + len);

        if (data.length < len) {
            throw new FormatError(header, `option ${type} at offset ${p} declares ${len} bytes, ${data.length} remain`);
        }

        let decoder = OPTION_DECODERS[type];
        if (!decoder) {
            options.push(new UnknownOption(type, data));
        } else if (decoder.length !== undefined && decoder.length != len) {
            throw new FormatError(header, `option ${type} must be ${decoder.length} bytes got ${len}`);
        } else {
            options.push(decoder.decode(data));
        }

        p += 2 + len;
    }

    return options;
}

/** the padding options that fill `count` octets, `count` of zero needs none */
export function createPadding(count: number): (Pad1 | PadN)[] {
    let padding: (Pad1 | PadN)[] = [];

    while (count > 0) {
        if (count == 1) {
            padding.push(new Pad1());
            break;
        }

        // PadN carries at most 255 bytes of value, never leave a single octet behind
        let n = Math.min(count, MAX_OPTION_DATA_LENGTH + 2);
        if (count - n == 1) n--;

        padding.push(new PadN(n));
        count -= n;
    }

    return padding;
}

/** the octets of padding needed to bring `length` to a multiple of 8 */
export function paddingNeeded(length: number): number {
    return (8 - (length % 8)) % 8;
}
