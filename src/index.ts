export * from "./lib/address";
export * from "./lib/binary/struct";
export * from "./lib/binary/uint8-array";
export * from "./lib/binary/checksum";
export * from "./lib/struct-types/address";
export * from "./lib/header";
export * from "./lib/packet";
