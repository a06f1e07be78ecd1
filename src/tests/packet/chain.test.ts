import { describe, expect, test } from "vitest";
import { ETHER_TYPES, EthernetHeader } from "../../lib/header/ethernet";
import { ICMPv6Header } from "../../lib/header/icmp";
import {
    IPv6DestinationOptionsHeader,
    IPv6FragmentHeader,
    IPv6HopByHopHeader,
    IPv6MobilityHeader,
    IPv6NoNextHeader,
    IPv6RoutingHeader,
} from "../../lib/header/ip/ext";
import { IPv6Header } from "../../lib/header/ip/ipv6";
import { PROTOCOLS } from "../../lib/header/ip/protocols";
import { RawPayload } from "../../lib/header/raw";
import { decoderFor, nextDecoder, protocolOf } from "../../lib/packet/chain";

describe("Next header chain", () => {
    test("decoderFor", () => {
        expect(decoderFor(PROTOCOLS.IPv6HopOption)).toBe(IPv6HopByHopHeader)
        expect(decoderFor(PROTOCOLS.IPv6RouteOption)).toBe(IPv6RoutingHeader)
        expect(decoderFor(PROTOCOLS.IPv6Fragment)).toBe(IPv6FragmentHeader)
        expect(decoderFor(PROTOCOLS.IPv6DestinationOption)).toBe(IPv6DestinationOptionsHeader)
        expect(decoderFor(PROTOCOLS.IPv6Mobility)).toBe(IPv6MobilityHeader)
        expect(decoderFor(PROTOCOLS.ICMPv6)).toBe(ICMPv6Header)
        expect(decoderFor(PROTOCOLS.IPv6)).toBe(IPv6Header)
        expect(decoderFor(PROTOCOLS.IPv6NoNext)).toBe("end")
        expect(decoderFor(PROTOCOLS.UDP)).toBe(RawPayload)
    })

    test("nextDecoder", () => {
        expect(nextDecoder(new EthernetHeader({ ethertype: ETHER_TYPES.IPv6 }))).toBe(IPv6Header)
        expect(nextDecoder(new EthernetHeader({ ethertype: ETHER_TYPES.ARP }))).toBe(RawPayload)
        expect(nextDecoder(new IPv6Header({ nextHeader: PROTOCOLS.IPv6Fragment }))).toBe(IPv6FragmentHeader)
        expect(nextDecoder(new IPv6FragmentHeader(1, 0, false, PROTOCOLS.ICMPv6))).toBe(ICMPv6Header)
        expect(nextDecoder(new IPv6MobilityHeader())).toBe("end")
        expect(nextDecoder(new ICMPv6Header())).toBe("end")
        expect(nextDecoder(new RawPayload())).toBe("end")
        expect(nextDecoder(new IPv6NoNextHeader())).toBe("end")
    })

    test("protocolOf", () => {
        expect(protocolOf(new IPv6Header())).toBe(41)
        expect(protocolOf(new IPv6HopByHopHeader())).toBe(0)
        expect(protocolOf(new IPv6RoutingHeader())).toBe(43)
        expect(protocolOf(new IPv6FragmentHeader())).toBe(44)
        expect(protocolOf(new IPv6DestinationOptionsHeader())).toBe(60)
        expect(protocolOf(new IPv6MobilityHeader())).toBe(135)
        expect(protocolOf(new IPv6NoNextHeader())).toBe(59)
        expect(protocolOf(new ICMPv6Header())).toBe(58)
        expect(protocolOf(new EthernetHeader())).toBeUndefined()
        expect(protocolOf(new RawPayload())).toBeUndefined()
    })
})
