import { Buffer } from "buffer";
import { describe, test, expect } from "vitest";
import { IPV4Address } from "../../lib/address/ipv4";
import { IPV6Address, SPECIAL_IPV6_ADDRESSES } from "../../lib/address/ipv6";

describe("IPV6 Address", () => {
    test("toString", () => {
        let addr = "ff56:9909:ed01:8888:c438:0600:a1ac:ba00";
        let buf = Buffer.from("ff569909ed018888c4380600a1acba00", "hex");
        expect(new IPV6Address(buf).toString(-1)).eq(addr)
    })

    test("parser", () => {
        let addr = "fe80::c438:600:a1ac:ba00";
        let ipv6 = new IPV6Address(addr);
        expect(ipv6.toString()).eq(addr)
        expect(ipv6.toString(0)).eq("fe80:0:0:0:c438:600:a1ac:ba00")
    })

    test("toString & parser", () => {
        let addr = "ff02::"
        let ipv6 = new IPV6Address("ff02::");
        expect(ipv6.toString(4)).eq(addr)
        expect(ipv6.toString(0)).eq("ff02:0:0:0:0:0:0:0")
        expect(ipv6.toString(-1)).eq("ff02:0000:0000:0000:0000:0000:0000:0000")

        expect(new IPV6Address("::").toString()).eq("::")
        expect(new IPV6Address("::1").toString()).eq("::1")
        expect(new IPV6Address("FC00:0:0:0:0:0:0:2").toString()).eq("fc00::2")
        // a lone zero group stays
        expect(new IPV6Address("1:0:2:3:4:5:6:7").toString()).eq("1:0:2:3:4:5:6:7")
    })

    test("rejects malformed input", () => {
        expect(() => new IPV6Address("1::2::3")).toThrow()
        expect(() => new IPV6Address("10.0.0.1")).toThrow()
        expect(() => new IPV6Address("fffff::")).toThrow()
        expect(() => new IPV6Address("1:2:3:4:5:6:7:8:9")).toThrow()
        expect(() => new IPV6Address(new Uint8Array(4))).toThrow()

        expect(IPV6Address.validate("fc00::a")).eq(true)
        expect(IPV6Address.validate("10.0.0.1")).eq(false)
        expect(IPV6Address.validate(42)).eq(false)
    })

    test("is X", () => {
        let llAddr = new IPV6Address("fe80::c438:600:a1ac:ba00");
        expect(llAddr.isLinkLocal()).eq(true);
        expect(new IPV6Address("fec0::1").isLinkLocal()).eq(false);

        let mcAddr = new IPV6Address("ff02::1");
        expect(mcAddr.isMulticast()).eq(true)

        let loopAddr = new IPV6Address("::1");
        expect(loopAddr.isLoopback()).eq(true)
        expect(loopAddr.isUnspecified()).eq(false)
    })

    test("equals", () => {
        let a = new IPV6Address("fc00::a");
        expect(a.equals(new IPV6Address("fc00:0::a"))).eq(true)
        expect(a.equals(new IPV6Address("fc00::b"))).eq(false)
        expect(new IPV6Address("::").equals(new IPV4Address("0.0.0.0"))).eq(false)
    })

    test("special addresses", () => {
        expect(SPECIAL_IPV6_ADDRESSES.UNSPECIFIED.isUnspecified()).eq(true)
        expect(SPECIAL_IPV6_ADDRESSES.LOOPBACK.toString()).eq("::1")
        expect(SPECIAL_IPV6_ADDRESSES.ALL_NODES.toString()).eq("ff02::1")
        expect(SPECIAL_IPV6_ADDRESSES.ALL_ROUTERS.toString()).eq("ff02::2")
    })
})
