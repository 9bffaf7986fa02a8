export { loadHttpConfigFromEnv } from "./httpConfig";
export type { Env } from "./httpConfig";
export { ConfigError } from "./configError";
