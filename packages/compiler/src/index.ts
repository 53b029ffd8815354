export * from './types.js';
export * from './pipeline/index.js';
export * from './frontend/index.js';
export * from './emitter/index.js';
export * from './generator/index.js';

export { FieldMetaCompiler, compileType } from './compiler.js';
export { loadConfigFile, CONFIG_FILE_NAME } from './config.js';
export { createProgram } from './cli/index.js';
export { VERSION } from './version.js';
