export * from "./options";
export * from "./routing";
export * from "./fragment";
export * from "./mobility";
export * from "./no-next";
