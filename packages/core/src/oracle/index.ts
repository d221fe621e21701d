export * from "./canonical";
export * from "./attestation";
export * from "./types";
export * from "./mock";
