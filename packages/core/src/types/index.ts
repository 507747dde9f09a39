export * from "./alert";
export * from "./context";
export * from "./checklist";
export * from "./errors";
