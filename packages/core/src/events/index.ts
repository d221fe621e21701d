export * from "./types";
export * from "./journal";
export * from "./jsonl";
