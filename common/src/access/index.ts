export * from "./Access";
