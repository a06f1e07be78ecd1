export * from "./option";
export * from "./kinds";
export * from "./tlv";
