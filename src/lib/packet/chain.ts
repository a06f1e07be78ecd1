import { EthernetHeader, ETHER_TYPES } from "../header/ethernet";
import { ICMPv6Header } from "../header/icmp";
import {
    IPv6DestinationOptionsHeader,
    IPv6FragmentHeader,
    IPv6HopByHopHeader,
    IPv6MobilityHeader,
    IPv6NoNextHeader,
    IPv6RoutingHeader,
} from "../header/ip/ext";
import { IPv6Header } from "../header/ip/ipv6";
import { PROTOCOLS, type Protocol } from "../header/ip/protocols";
import { RawPayload } from "../header/raw";
import type { HeaderDecoder } from "./header";

/** every header a packet can hold */
export type PacketHeader =
    | EthernetHeader
    | IPv6Header
    | IPv6HopByHopHeader
    | IPv6DestinationOptionsHeader
    | IPv6RoutingHeader
    | IPv6FragmentHeader
    | IPv6MobilityHeader
    | IPv6NoNextHeader
    | ICMPv6Header
    | RawPayload;

/** "end" halts the chain, the raw decoder takes whatever bytes are left */
export type ChainDecoder = HeaderDecoder<PacketHeader> | "end";

const DECODERS: Partial<Record<Protocol, HeaderDecoder<PacketHeader>>> = {
    [PROTOCOLS.IPv6HopOption]: IPv6HopByHopHeader,
    [PROTOCOLS.IPv6RouteOption]: IPv6RoutingHeader,
    [PROTOCOLS.IPv6Fragment]: IPv6FragmentHeader,
    [PROTOCOLS.IPv6DestinationOption]: IPv6DestinationOptionsHeader,
    [PROTOCOLS.IPv6Mobility]: IPv6MobilityHeader,
    [PROTOCOLS.ICMPv6]: ICMPv6Header,
    [PROTOCOLS.IPv6]: IPv6Header,
};

export function decoderFor(code: Protocol): ChainDecoder {
    if (code == PROTOCOLS.IPv6NoNext) {
        return "end";
    }

    return DECODERS[code] ?? RawPayload;
}

/** what follows `header` on the wire */
export function nextDecoder(header: PacketHeader): ChainDecoder {
    switch (header.kind) {
        case "ethernet":
            return header.ethertype == ETHER_TYPES.IPv6 ? IPv6Header : RawPayload;
        case "ipv6":
        case "ipv6-hop-by-hop":
        case "ipv6-destination-options":
        case "ipv6-routing":
        case "ipv6-fragment":
        case "ipv6-mobility":
            return decoderFor(header.nextHeader);
        case "ipv6-no-next":
        case "icmpv6":
        case "raw":
            return "end";
        default: {
            let unreachable: never = header;
            throw new Error("unknown header " + String(unreachable));
        }
    }
}

/** the code a preceding header stores to name `header`, undefined for headers without one */
export function protocolOf(header: PacketHeader): Protocol | undefined {
    switch (header.kind) {
        case "ipv6": return IPv6Header.PROTOCOL;
        case "ipv6-hop-by-hop": return IPv6HopByHopHeader.PROTOCOL;
        case "ipv6-destination-options": return IPv6DestinationOptionsHeader.PROTOCOL;
        case "ipv6-routing": return IPv6RoutingHeader.PROTOCOL;
        case "ipv6-fragment": return IPv6FragmentHeader.PROTOCOL;
        case "ipv6-mobility": return IPv6MobilityHeader.PROTOCOL;
        case "ipv6-no-next": return IPv6NoNextHeader.PROTOCOL;
        case "icmpv6": return ICMPv6Header.PROTOCOL;
        case "ethernet":
        case "raw":
            return undefined;
    }
}
