export * from "./keypair";
export * from "./schemas";
export * from "./server";
export * from "./relay";
