/**
 * Configuration error — missing or invalid environment at startup
 */
export class ConfigError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}
