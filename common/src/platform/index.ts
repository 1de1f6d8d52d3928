export * from "./Platform";
