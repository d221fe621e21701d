export * from "./math";
export * from "./engine";
