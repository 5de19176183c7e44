export class ConfigError extends Error {
  constructor(message: string, public issues: string[] = [], public cause?: unknown) {
    super(message);
    this.name = "ConfigError";
  }
}
