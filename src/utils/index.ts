/**
 * Utils barrel exports
 */

export * from "./sleep";
export * from "./errorDescription";
export * from "./headers";
