export * from "./base";
export * from "./mac";
export * from "./ipv4";
export * from "./ipv6";
