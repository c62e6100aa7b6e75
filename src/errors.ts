/**
 * A dependency file could not be read or is malformed for its format.
 * Always scoped to one file; the scanner records it and moves on.
 */
export class ParsingError extends Error {
  readonly filePath: string;
  readonly lineNumber: number | undefined;

  constructor(message: string, filePath: string, lineNumber?: number) {
    super(message);
    this.name = 'ParsingError';
    this.filePath = filePath;
    this.lineNumber = lineNumber;
  }
}

export class ConfigurationError extends Error {
  readonly configField: string | undefined;

  constructor(message: string, configField?: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.configField = configField;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
