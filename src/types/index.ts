export * from "./logger";
export * from "./clients/http";
export * from "./retry";
export * from "./config";
