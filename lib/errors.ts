/**
 * Raised while resolving the platform configuration, before any construct
 * is created. Carries every problem found so they can be fixed in one pass.
 */
export class ConfigurationError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid platform configuration:\n${problems.map(problem => `  - ${problem}`).join('\n')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/**
 * Raised by the configuration file renderers when their input cannot
 * produce a valid file.
 */
export class RenderError extends Error {
  constructor(public readonly file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = 'RenderError';
  }
}
