export * from "./logger";
export * from "./config";
export * from "./retry";
export * from "./clients/http";
