// <https://www.iana.org/assignments/protocol-numbers/protocol-numbers.xhtml>

export const PROTOCOLS = {
    /** IPv6 Hop-by-Hop Option */
    IPv6HopOption: 0,
    ICMP: 1,
    IGMP: 2,
    IPv4: 4,
    TCP: 6,
    UDP: 17,
    /** IPv6 encapsulation */
    IPv6: 41,
    IPv6RouteOption: 43,
    IPv6Fragment: 44,
    GRE: 47,
    ESP: 50,
    AH: 51,
    ICMPv6: 58,
    IPv6NoNext: 59,
    IPv6DestinationOption: 60,
    OSPF: 89,
    SCTP: 132,
    IPv6Mobility: 135,
    HIP: 139,
    Shim6: 140,
    /** Use for experimentation and testing */
    Experimental1: 253,
    Experimental2: 254,
} as const;

/** protocol numbers 146 to 252 are unassigned and 255 is reserved */
export const LAST_ASSIGNED_PROTOCOL = 145;

/** any assigned protocol number, `PROTOCOLS` only names the ones this library refers to */
export type Protocol = number;

export function isProtocol(n: number): n is Protocol {
    return Number.isInteger(n) && ((n >= 0 && n <= LAST_ASSIGNED_PROTOCOL)
        || n == PROTOCOLS.Experimental1 || n == PROTOCOLS.Experimental2);
}

export function protocolName(n: number): string {
    let entry = Object.entries(PROTOCOLS).find(([, value]) => value == n);
    return entry ? entry[0] : "Protocol" + n;
}
