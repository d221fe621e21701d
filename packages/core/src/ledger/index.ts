export * from "./provider";
export * from "./mock";
