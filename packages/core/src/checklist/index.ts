export * from "./generator";
export * from "./pipeline";
