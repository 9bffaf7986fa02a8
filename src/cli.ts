/**
 * Command-line front end
 *
 * Usage:
 *   retry-channel <METHOD> <URL> [--json <value>] [--data <text>]
 *                 [--header "Name: value"]... [--query key=value]...
 *
 * Timeout and retry policy come from the HTTP_* environment variables
 * (see config/httpConfig).
 */

import type { HttpHeaders, JsonValue, QueryParams, QueryValue } from "@/types";
import type { HttpTransport } from "@/interfaces";
import { Channel } from "@/clients/http";
import { loadHttpConfigFromEnv } from "@/config";
import type { Env } from "@/config";
import { describeError } from "@/utils";

export const CLI_USAGE =
  'Usage: retry-channel <METHOD> <URL> [--json <value>] [--data <text>] [--header "Name: value"]... [--query key=value]...';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export interface CliArgs {
  method: string;
  url: string;
  headers: HttpHeaders;
  query: QueryParams;
  json?: JsonValue;
  data?: string;
}

export interface CliDeps {
  env: Env;
  write: (line: string) => void;
  /** Optional transport (for testing) */
  transport?: HttpTransport;
}

function takeValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

function parseHeader(raw: string): [string, string] {
  const separator = raw.indexOf(":");
  if (separator <= 0) {
    throw new CliUsageError(`Invalid header "${raw}", expected "Name: value"`);
  }
  return [raw.slice(0, separator).trim(), raw.slice(separator + 1).trim()];
}

function addQuery(query: QueryParams, raw: string): void {
  const separator = raw.indexOf("=");
  if (separator <= 0) {
    throw new CliUsageError(`Invalid query "${raw}", expected key=value`);
  }
  const key = raw.slice(0, separator);
  const value: QueryValue = raw.slice(separator + 1);
  const existing = query[key];
  if (existing === undefined) {
    query[key] = value;
  } else {
    query[key] = Array.isArray(existing) ? [...existing, value] : [existing, value];
  }
}

function parseJson(raw: string): JsonValue {
  try {
    return JSON.parse(raw);
  } catch {
    throw new CliUsageError(`--json value is not valid JSON: ${raw}`);
  }
}

/**
 * @throws {CliUsageError} On unknown flags, missing values or missing positionals
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const positionals: string[] = [];
  const headers: HttpHeaders = {};
  const query: QueryParams = {};
  let json: JsonValue | undefined;
  let data: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--json":
        json = parseJson(takeValue(argv, i, arg));
        i++;
        break;
      case "--data":
        data = takeValue(argv, i, arg);
        i++;
        break;
      case "--header": {
        const [name, value] = parseHeader(takeValue(argv, i, arg));
        headers[name] = value;
        i++;
        break;
      }
      case "--query":
        addQuery(query, takeValue(argv, i, arg));
        i++;
        break;
      default:
        if (arg.startsWith("--")) {
          throw new CliUsageError(`Unknown option ${arg}`);
        }
        positionals.push(arg);
    }
  }

  if (positionals.length !== 2) {
    throw new CliUsageError(`Expected <METHOD> <URL>, got ${positionals.length} argument(s)`);
  }

  const [method, url] = positionals;
  return { method, url, headers, query, json, data };
}

/**
 * Run one request and print the status line and body
 * @returns Process exit code: 0 success, 1 request failure, 2 usage error
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      deps.write(`Error: ${error.message}`);
      deps.write(CLI_USAGE);
      return 2;
    }
    throw error;
  }

  try {
    const settings = loadHttpConfigFromEnv(deps.env);
    const channel = new Channel({
      url: args.url,
      timeoutMs: settings.timeoutMs,
      retryPolicy: settings.retryPolicy,
      transport: deps.transport,
    });
    const response = await channel.request({
      method: args.method,
      headers: args.headers,
      query: Object.keys(args.query).length > 0 ? args.query : undefined,
      json: args.json,
      data: args.data,
    });
    deps.write(`${response.status} ${response.statusText}`);
    const body = response.text();
    if (body) {
      deps.write(body);
    }
    return 0;
  } catch (error) {
    deps.write(`Error: ${describeError(error)}`);
    return 1;
  }
}
