export * from "./ethernet";
export * from "./types";
