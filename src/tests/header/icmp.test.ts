import { Buffer } from "buffer";
import { describe, expect, test } from "vitest";
import { uint8_toHex } from "../../lib/binary/uint8-array";
import { ICMPV6_TYPES, ICMPv6Header } from "../../lib/header/icmp";
import { IPv6Header } from "../../lib/header/ip/ipv6";
import { FormatError } from "../../lib/packet/errors";

describe("ICMPv6 Header", () => {
    test("defaults to an empty echo request", () => {
        let icmp = new ICMPv6Header();

        expect(icmp.type).eq(ICMPV6_TYPES.ECHO_REQUEST)
        expect(icmp.size).eq(8)
        expect(uint8_toHex(icmp.encode())).eq("8000000000000000")
    })

    test("decode keeps the checksum", () => {
        let [icmp, consumed] = ICMPv6Header.decode(Buffer.from("8100abcd00010002", "hex"));

        expect(consumed).eq(8)
        expect(icmp.type).eq(ICMPV6_TYPES.ECHO_REPLY)
        expect(icmp.checksum).eq(0xabcd)
        expect(uint8_toHex(icmp.body)).eq("00010002")
        expect(icmp.equals(new ICMPv6Header({ type: 129, body: Buffer.from("00010002", "hex") }))).eq(true)
    })

    test("checksum over the preceding IPv6 header", () => {
        let ip = new IPv6Header({ source: "fc00::a", destination: "fc00::b" });
        let icmp = new ICMPv6Header();

        let buf = icmp.encode({ headers: [ip, icmp], index: 1 });
        expect(uint8_toHex(buf)).eq("800087a600000000")
        // encoding leaves the header untouched
        expect(icmp.checksum).eq(0)
    })

    test("errors", () => {
        expect(() => ICMPv6Header.decode(new Uint8Array(3))).toThrow(FormatError)
        expect(() => new ICMPv6Header({ code: 256 })).toThrow()
    })
})
