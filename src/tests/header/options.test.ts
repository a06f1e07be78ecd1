import { afterEach, describe, expect, test, vi } from "vitest";
import { IPV4Address } from "../../lib/address/ipv4";
import { uint8_toHex } from "../../lib/binary/uint8-array";
import { StructValueError } from "../../lib/binary/struct";
import {
    ALIGNMENT_WARNING,
    createPadding,
    decodeOptions,
    encodeOptions,
    HomeAddress,
    IPV6_OPTION_TYPES,
    JumboPayload,
    optionAction,
    optionMayChange,
    Pad1,
    PadN,
    paddingNeeded,
    RouterAlert,
    TunnelEncapsulationLimit,
    UnknownOption,
} from "../../lib/header/ip/options";
import { FormatError, TypeMismatchError } from "../../lib/packet/errors";

afterEach(() => {
    vi.restoreAllMocks();
})

describe("IPv6 Options", () => {
    test("encode", () => {
        expect(uint8_toHex(new Pad1().encode())).eq("00")
        expect(uint8_toHex(new PadN().encode())).eq("0100")
        expect(uint8_toHex(new PadN(3).encode())).eq("010100")
        expect(uint8_toHex(new RouterAlert(0x13).encode())).eq("05020013")
        expect(uint8_toHex(new TunnelEncapsulationLimit(0x13).encode())).eq("040113")
        expect(uint8_toHex(new JumboPayload(10000).encode())).eq("c20400002710")
        expect(uint8_toHex(new HomeAddress("fc00::2").encode())).eq("c910fc000000000000000000000000000002")
        expect(uint8_toHex(new UnknownOption(0x3e, new Uint8Array([0xaa])).encode())).eq("3e01aa")
    })

    test("size", () => {
        expect(new Pad1().size).eq(1)
        expect(new PadN(4).size).eq(4)
        expect(new RouterAlert().size).eq(4)
        expect(new HomeAddress("fc00::2").size).eq(18)
        expect(new JumboPayload(0).size).eq(6)
    })

    test("values are validated on assignment", () => {
        expect(() => new PadN(1)).toThrow(StructValueError)
        expect(() => new PadN(258)).toThrow(StructValueError)
        expect(() => new RouterAlert(0x10000)).toThrow(StructValueError)
        expect(() => new TunnelEncapsulationLimit(256)).toThrow(StructValueError)
        expect(() => new JumboPayload(2 ** 32)).toThrow(StructValueError)
        expect(new JumboPayload(2 ** 32 - 1).payloadLength).eq(4294967295)

        expect(() => new HomeAddress(new IPV4Address("10.0.0.1"))).toThrow(TypeMismatchError)
        expect(() => new HomeAddress("10.0.0.1")).toThrow(TypeMismatchError)

        let limit = new TunnelEncapsulationLimit();
        expect(limit.limit).eq(4)
        expect(() => { limit.limit = -1 }).toThrow(StructValueError)
        expect(limit.limit).eq(4)
    })

    test("equals", () => {
        expect(new PadN(3).equals(new PadN(3))).eq(true)
        expect(new PadN(3).equals(new PadN(4))).eq(false)
        expect(new RouterAlert(1).equals(new UnknownOption(5, new Uint8Array([0, 1])))).eq(false)
        expect(new HomeAddress("fc00::2").equals(new HomeAddress("fc00:0:0::2"))).eq(true)
    })

    test("clone is independent", () => {
        let alert = new RouterAlert(1);
        let copy = alert.clone();
        copy.value = 2;

        expect(alert.value).eq(1)
        expect(copy.equals(new RouterAlert(2))).eq(true)
    })

    test("action and may change bits", () => {
        expect(optionAction(IPV6_OPTION_TYPES.ROUTER_ALERT)).eq("skip")
        expect(optionAction(0x40)).eq("discard")
        expect(optionAction(0x80)).eq("discard-icmp")
        expect(optionAction(IPV6_OPTION_TYPES.JUMBO_PAYLOAD)).eq("discard-icmp-unicast")
        expect(optionAction(IPV6_OPTION_TYPES.HOME_ADDRESS)).eq("discard-icmp-unicast")

        expect(optionMayChange(IPV6_OPTION_TYPES.ROUTER_ALERT)).eq(false)
        expect(optionMayChange(0x3e)).eq(true)
    })

    test("toString", () => {
        expect(new PadN(3).toString()).eq("PadN(3)")
        expect(new HomeAddress("fc00::2").toString()).eq("HomeAddress(fc00::2)")
        expect(new UnknownOption(0x3e, new Uint8Array([0xaa, 0xbb])).toString()).eq("Option62(aabb)")
    })
})

describe("TLV encoding", () => {
    test("aligned options do not warn", () => {
        let warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
        let bytes = encodeOptions([new RouterAlert(0x13), new PadN(2)]);

        expect(uint8_toHex(bytes)).eq("050200130100")
        expect(warn).not.toHaveBeenCalled()
    })

    test("misaligned options warn once and are kept as is", () => {
        let warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
        let bytes = encodeOptions([new HomeAddress("fc00::2")]);

        expect(bytes.length).eq(18)
        expect(warn).toHaveBeenCalledTimes(1)
        expect(warn.mock.calls[0][0]).eq(`Size of IPv6 options header (20 bytes) is ${ALIGNMENT_WARNING}`)
        expect(ALIGNMENT_WARNING).eq("not an even multiple of 8")
    })

    test("prefix length is part of the alignment", () => {
        let warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
        encodeOptions([new PadN(8)], 0);

        expect(warn).not.toHaveBeenCalled()
    })
})

describe("TLV decoding", () => {
    test("known options", () => {
        let options = decodeOptions(new Uint8Array([0x00, 0x01, 0x01, 0x00, 0x05, 0x02, 0x00, 0x13]));

        expect(options.length).eq(3)
        expect(options[0]).toStrictEqual(new Pad1())
        expect(options[1]).toStrictEqual(new PadN(3))
        expect(options[2]).toStrictEqual(new RouterAlert(0x13))
    })

    test("unknown options keep their value", () => {
        let [option] = decodeOptions(new Uint8Array([0x3e, 0x02, 0xaa, 0xbb]));

        expect(option).toBeInstanceOf(UnknownOption)
        expect(option.type).eq(0x3e)
        expect(uint8_toHex(option.data())).eq("aabb")
    })

    test("home address and jumbo payload", () => {
        let bytes = new Uint8Array([...new HomeAddress("fc00::2").encode(), ...new JumboPayload(10000).encode()]);
        let options = decodeOptions(bytes);

        expect(options[0].equals(new HomeAddress("fc00::2"))).eq(true)
        expect(options[1].equals(new JumboPayload(10000))).eq(true)
    })

    test("malformed options", () => {
        // missing length
        expect(() => decodeOptions(new Uint8Array([0x05]))).toThrow(FormatError)
        // value runs past the end
        expect(() => decodeOptions(new Uint8Array([0x05, 0x02, 0x00]))).toThrow(FormatError)
        // tunnel encapsulation limit is one byte
        expect(() => decodeOptions(new Uint8Array([0x04, 0x02, 0x00, 0x00]))).toThrow(FormatError)
        expect(() => decodeOptions(new Uint8Array([0xc9, 0x04, 0, 0, 0, 0]))).toThrow(
            "cannot decode IPv6 options; option 201 must be 16 bytes got 4"
        )
    })

    test("empty buffer", () => {
        expect(decodeOptions(new Uint8Array(0))).toEqual([])
    })
})

describe("Padding", () => {
    test("createPadding", () => {
        expect(createPadding(0)).toEqual([])
        expect(createPadding(1)).toStrictEqual([new Pad1()])
        expect(createPadding(6)).toStrictEqual([new PadN(6)])
        expect(createPadding(257)).toStrictEqual([new PadN(257)])
        expect(createPadding(258)).toStrictEqual([new PadN(256), new PadN(2)])
    })

    test("paddingNeeded", () => {
        expect(paddingNeeded(20)).eq(4)
        expect(paddingNeeded(16)).eq(0)
        expect(paddingNeeded(9)).eq(7)
    })
})
