export type FileType =
  | 'requirements'
  | 'pyproject-toml'
  | 'setup-py'
  | 'setup-cfg'
  | 'pipfile'
  | 'poetry-lock'
  | 'uv-lock'
  | 'conda-environment'
  | 'package-json'
  | 'yarn-lock'
  | 'npm-lock'
  | 'pnpm-lock'
  | 'dockerfile'
  | 'docker-compose';

export type Ecosystem = 'pypi' | 'conda' | 'npm' | 'docker' | 'debian' | 'rpm' | 'alpine';

/**
 * Family of formats a parser belongs to. Selects the exclusion rules applied
 * to its candidates, independently of the ecosystem a candidate is tagged with
 * (a `pip install` inside a Dockerfile is a `pypi` package under container rules).
 * Base images from `FROM` and compose `image:` have a scope of their own.
 */
export type PolicyScope = 'python' | 'javascript' | 'container' | 'image';

export type OutputFormat = 'terminal' | 'json' | 'markdown';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface SourceLocation {
  /** Absolute path of the declaring file. */
  readonly filePath: string;
  /** 1-indexed. */
  readonly lineNumber: number;
  readonly declaration: string;
  readonly fileType: FileType;
}

export interface Package {
  /** Trimmed and case-folded. */
  readonly name: string;
  /**
   * Constraint for manifests (`>=3.2.0`, `^2.28`), resolved version for
   * lockfiles (`4.17.21`). Never empty.
   */
  readonly version: string;
  readonly ecosystem: Ecosystem;
  readonly sourceLocations: readonly SourceLocation[];
  readonly extras: readonly string[];
  readonly environmentMarker: string | undefined;
  readonly editable: boolean;
  readonly url: string | undefined;
}

export interface ParseFailure {
  readonly filePath: string;
  readonly fileType: FileType;
  readonly message: string;
  readonly lineNumber: number | undefined;
}

export interface ScanSummary {
  readonly filesScanned: number;
  readonly filesFailed: number;
  readonly totalPackages: number;
  readonly totalLocations: number;
  readonly byEcosystem: Readonly<Partial<Record<Ecosystem, number>>>;
}

export interface ScanResult {
  readonly rootDir: string;
  readonly packages: readonly Package[];
  readonly failures: readonly ParseFailure[];
  readonly summary: ScanSummary;
}

export interface ScanConfig {
  readonly rootDir: string;
  readonly format: OutputFormat;
  /** Directory names skipped in addition to the built-in list. */
  readonly excludeDirs: readonly string[];
  readonly ignorePackages: readonly string[];
  readonly allowPackages: readonly string[];
  readonly logLevel: LogLevel | undefined;
}
