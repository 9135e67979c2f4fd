/**
 * Error type definitions for the chunkwise CLI and library
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 *
 * The processing core never lets these escape a processor, extractor,
 * tagging or search call; they surface from option validation, the
 * config layer and the CLI.
 */

/**
 * Base class for all chunkwise errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors: invalid TOML, values outside
 * their schema, unknown keys.
 *
 * Exit code 2
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: chunkwise config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when the generation provider needs an API key that is not set.
 *
 * Exit code 4
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable, or switch provider with: chunkwise config set default_provider ollama`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide field-level errors.
 *
 * Exit code 1
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown by the CLI when no registered processor accepts a file.
 *
 * Library callers get an empty result instead; this only exists so the
 * command line can report the reason with its own exit code.
 *
 * Exit code 6
 */
export class UnsupportedFormatError extends CLIError {
  public readonly extension: string;

  constructor(path: string, extension: string) {
    super(
      `No processor accepts ${path}`,
      `Extension '${extension || '(none)'}' is not routed. Run: chunkwise formats  to list supported extensions`,
      6
    );
    this.name = 'UnsupportedFormatError';
    this.extension = extension;
  }
}
