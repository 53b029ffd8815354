import { CompileError, type SourceLocation } from '@fieldmeta/protocol';

/**
 * A described declaration the front end cannot map to a field list,
 * e.g. a type alias to a union
 */
export class UnsupportedDeclarationError extends CompileError {
	public readonly declarationKind: string;

	constructor(typeName: string, declarationKind: string, location?: SourceLocation) {
		const at = location ? ` (${location.file}:${location.line})` : '';
		super(
			`Type "${typeName}" is a ${declarationKind}; only classes, interfaces, object type literals and enums can be described${at}`,
			typeName,
			undefined,
			location
		);
		this.name = 'UnsupportedDeclarationError';
		this.declarationKind = declarationKind;
	}
}

export function isUnsupportedDeclarationError(error: unknown): error is UnsupportedDeclarationError {
	return error instanceof UnsupportedDeclarationError;
}

/**
 * Two described declarations in one file share a name, e.g. merged interfaces
 */
export class DuplicateDeclarationError extends CompileError {
	constructor(typeName: string, location?: SourceLocation) {
		const at = location ? ` (${location.file}:${location.line})` : '';
		super(`Type "${typeName}" is described more than once in the same file${at}`, typeName, undefined, location);
		this.name = 'DuplicateDeclarationError';
	}
}

export function isDuplicateDeclarationError(error: unknown): error is DuplicateDeclarationError {
	return error instanceof DuplicateDeclarationError;
}
