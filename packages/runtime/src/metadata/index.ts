/**
 * Operation synthesis and decorator markers
 */

export type { OperationsOptions } from './types.js';
export type { MetaValues, FieldDecorator } from './decorators.js';
export { Described, Meta, Label } from './decorators.js';
export { createOperations, stdoutSink } from './operations.js';
export { encodeTable, encodeOrderedObject } from './encode.js';
