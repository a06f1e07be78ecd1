export * from "./ethernet";
export * from "./ip";
export * from "./icmp";
export * from "./raw";
