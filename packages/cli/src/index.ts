export { createProgram } from './program.js';
export { renderManifest } from './commands/manifest.js';
export type { ManifestFormat } from './commands/manifest.js';
export { resolveReport, formatResolution } from './commands/resolve.js';
export type { ResolutionReport } from './commands/resolve.js';
export { checkHierarchy, formatCheck } from './commands/check.js';
export type { CheckSummary } from './commands/check.js';
export { formatError } from './utils/errorFormatter.js';
