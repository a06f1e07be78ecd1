import { IPV6Address } from "./ipv6";
import { ADDRESS_TYPESV6, ALL_NODES_ADDRESSV6, ALL_ROUTERS_ADDRESSV6 } from "./reserved";

/** well-known addresses, copy before handing one out as a mutable field value */
export const SPECIAL_IPV6_ADDRESSES = {
    UNSPECIFIED: new IPV6Address(ADDRESS_TYPESV6.UNSPECIFIED[0]),
    LOOPBACK: new IPV6Address(ADDRESS_TYPESV6.LOOPBACK[0]),
    ALL_NODES: new IPV6Address(ALL_NODES_ADDRESSV6),
    ALL_ROUTERS: new IPV6Address(ALL_ROUTERS_ADDRESSV6),
} as const;
