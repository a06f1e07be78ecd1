export * from "./errors";
export * from "./fields";
export * from "./header";
export * from "./chain";
export * from "./packet";
