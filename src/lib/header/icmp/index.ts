export * from "./v6";
