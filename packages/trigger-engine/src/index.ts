export * from "./types";
export * from "./policies";
export * from "./registry";
