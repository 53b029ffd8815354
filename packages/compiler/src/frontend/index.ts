export { readDeclarations, readArgument, locate, MARKER_DECORATOR, MARKER_TAG } from './declaration-reader.js';
export type { ReadResult } from './declaration-reader.js';
export { createProject } from './project.js';
export {
	UnsupportedDeclarationError,
	isUnsupportedDeclarationError,
	DuplicateDeclarationError,
	isDuplicateDeclarationError,
} from './errors.js';
