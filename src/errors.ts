/**
 * Error taxonomy
 *
 * ValidationError  - bad input (empty URL, unknown design, layout that does not fit)
 * ConfigError      - configuration file missing or malformed
 * FontLoadError    - font asset missing; recovered by the text renderer
 * IOError          - output could not be written
 */

export class QrPosterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends QrPosterError {}

export class UnsupportedDesignError extends ValidationError {
  constructor(
    public readonly design: string,
    public readonly supported: readonly string[]
  ) {
    super(`Unsupported design: ${design}. Supported designs: ${supported.join(', ')}`);
  }
}

export class ConfigError extends QrPosterError {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${message}: ${path}`, options);
  }
}

export class FontLoadError extends QrPosterError {
  constructor(
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Font ${path} could not be loaded`, options);
  }
}

export class IOError extends QrPosterError {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${message}: ${path}`, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
