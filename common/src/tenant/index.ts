export * from "./Tenant";
