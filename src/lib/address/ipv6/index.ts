export * from "./ipv6";
export * from "./reserved";
export * from "./special";
