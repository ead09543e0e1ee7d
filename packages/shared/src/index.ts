export * from "./models.ts";
export * from "./protocol.ts";
export * from "./rest.ts";
export * from "./validators.ts";
