export { SourceFile, readSourceFile } from './source-file.js';
export { buildPackage, normalizePackageName, PackageCollector } from './package-builder.js';
export type { PackageCandidate } from './package-builder.js';
export { parseRequirementSpec, parseRequirementsFile } from './requirements-parser.js';
export type { RequirementSpec } from './requirements-parser.js';
export {
  parsePyprojectToml,
  parsePipfile,
  parseSetupPy,
  parseSetupCfg,
  parseCondaEnvironment,
  parseCondaSpec,
} from './python-manifest-parser.js';
export { parsePoetryLock, parseUvLock } from './python-lockfile-parser.js';
export { parsePackageJson } from './package-json-parser.js';
export { parseYarnLock, parseNpmLock, parsePnpmLock, parseYarnHeader, parsePnpmPackageKey } from './lockfile-parser.js';
export { parseDockerfile, parseImageReference, readInstructions } from './dockerfile-parser.js';
export type { DockerInstruction, ImageReference } from './dockerfile-parser.js';
export { parseInstallCommands, parseInstallSegment } from './shell-install-parser.js';
export type { InstalledPackage } from './shell-install-parser.js';
export { parseComposeFile } from './compose-parser.js';
export { MANIFEST_FORMATS, detectFormat, isManifestFile, parseManifest, parseManifestFile } from './router.js';
export type { ManifestFormat } from './router.js';
