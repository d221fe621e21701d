export * from "./sequence";
export * from "./coordinator";
