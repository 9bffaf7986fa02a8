/**
 * Raised when an environment variable holds a value that cannot be used
 */
export class ConfigError extends Error {
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable} ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}
