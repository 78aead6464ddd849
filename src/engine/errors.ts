/**
 * Engine faults. Test outcomes are never thrown; these are.
 */

export class EngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
  }
}

export class ConfigError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class LoadError extends EngineError {
  readonly binary: string;

  constructor(binary: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load test cases from ${binary}: ${message}`, options);
    this.name = 'LoadError';
    this.binary = binary;
  }
}

export class MetadataError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MetadataError';
  }
}

export class ManifestError extends EngineError {
  readonly file: string;

  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super(`${file}: ${message}`, options);
    this.name = 'ManifestError';
    this.file = file;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
