export * from "./ids";
export * from "./types";
export * from "./params";
export * from "./catalog";
export * from "./MacdCrossStrategy";
export * from "./MacdResonanceStrategy";
