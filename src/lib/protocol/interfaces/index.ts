export type * from "./config.ts";
export type * from "./frames.ts";
export * from "./defaults.ts";
