export { MetadataGenerator } from './generator.js';
export type { SourceUnit, GeneratedModule, UnitFailure, GenerationReport } from './generator.js';
export { resolveBuildForm } from './form.js';
