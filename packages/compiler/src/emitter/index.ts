export { emitModule, exportNameFor } from './module-emitter.js';
export type { EmitOptions } from './module-emitter.js';
export { outputPathFor, isGeneratedPath } from './paths.js';
export type { OutputPathConfig } from './paths.js';
