export * from "./types";
export * from "./filter";
export * from "./format";
export * from "./generic";
export * from "./slack";
export * from "./teams";
export * from "./pagerduty";
export * from "./email";
export * from "./file-output";
export * from "./config-loader";
export * from "./factory";
export * from "./dispatcher";
