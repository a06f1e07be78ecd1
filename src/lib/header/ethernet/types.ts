// source https://en.wikipedia.org/wiki/EtherType

export const ETHER_TYPES = {
    IPv4: 0x0800,
    ARP: 0x0806,
    VLAN: 0x8100,
    IPv6: 0x86DD,
} as const;

export type EtherType = number;
