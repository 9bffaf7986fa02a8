export type { HttpTransport } from "./clients/httpTransport";
