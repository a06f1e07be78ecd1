export * from "./protocols";
export * from "./ipv6";
export * from "./options";
export * from "./ext";
