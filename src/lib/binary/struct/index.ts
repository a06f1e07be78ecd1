export * from "./struct";
export * from "./define";
export * from "./value-types";
