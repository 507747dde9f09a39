export * from "./types";
export * from "./aws/s3-storage";
export * from "./aws/ec2-metadata";
export * from "./aws/cloudwatch-metrics";
export * from "./aws/cloudwatch-logs";
export * from "./local/file-storage";
export * from "./local/empty-sources";
