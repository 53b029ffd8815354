import type { AnnotationForm, AnnotationToken, SourceLocation } from './types.js';

export type ShapeErrorKind = 'PositionalFields' | 'NoFields' | 'DuplicateFields';

function at(location?: SourceLocation): string {
	return location ? ` (${location.file}:${location.line})` : '';
}

/**
 * Base class for every failure that aborts compiling a type
 */
export class CompileError extends Error {
	public readonly typeName: string;
	public readonly fieldName?: string;
	public readonly location?: SourceLocation;

	constructor(message: string, typeName: string, fieldName?: string, location?: SourceLocation) {
		super(message);
		this.name = 'CompileError';
		this.typeName = typeName;
		this.fieldName = fieldName;
		this.location = location;
	}
}

export class ShapeError extends CompileError {
	public readonly kind: ShapeErrorKind;

	constructor(kind: ShapeErrorKind, typeName: string, location?: SourceLocation, fieldName?: string) {
		super(describeShape(kind, typeName, fieldName) + at(location), typeName, fieldName, location);
		this.name = 'ShapeError';
		this.kind = kind;
	}
}

function describeShape(kind: ShapeErrorKind, typeName: string, fieldName?: string): string {
	switch (kind) {
		case 'PositionalFields':
			return `Type "${typeName}" has positional fields; only types with named fields can be described`;
		case 'NoFields':
			return `Type "${typeName}" declares no fields; only types with named fields can be described`;
		case 'DuplicateFields':
			return `Type "${typeName}" declares field "${fieldName ?? ''}" more than once`;
	}
}

export class PlacementError extends CompileError {
	public readonly kind = 'AnnotationOnType' as const;
	public readonly annotation: string;

	constructor(typeName: string, token: AnnotationToken) {
		const location = token.location;
		super(
			`@${token.name} cannot be applied to type "${typeName}"; annotations apply only to its fields${at(location)}`,
			typeName,
			undefined,
			location
		);
		this.name = 'PlacementError';
		this.annotation = token.name;
	}
}

export class ParseError extends CompileError {
	public readonly kind = 'MalformedAnnotation' as const;
	public readonly reason: string;

	constructor(
		typeName: string,
		fieldName: string,
		annotation: string,
		reason: string,
		location?: SourceLocation
	) {
		super(
			`Malformed @${annotation} on field "${fieldName}" of type "${typeName}": ${reason}${at(location)}`,
			typeName,
			fieldName,
			location
		);
		this.name = 'ParseError';
		this.reason = reason;
	}
}

/**
 * Raised when a build mixes the label and meta annotation forms
 */
export class FormMismatchError extends CompileError {
	public readonly expected: AnnotationForm;
	public readonly found: AnnotationForm;

	constructor(typeName: string, fieldName: string, token: AnnotationToken, expected: AnnotationForm) {
		super(
			`Field "${fieldName}" of type "${typeName}" uses @${token.name} but this build uses the ${expected} form${at(token.location)}`,
			typeName,
			fieldName,
			token.location
		);
		this.name = 'FormMismatchError';
		this.expected = expected;
		this.found = token.form;
	}
}

export function isCompileError(error: unknown): error is CompileError {
	return error instanceof CompileError;
}

export function isShapeError(error: unknown): error is ShapeError {
	return error instanceof ShapeError;
}

export function isPlacementError(error: unknown): error is PlacementError {
	return error instanceof PlacementError;
}

export function isParseError(error: unknown): error is ParseError {
	return error instanceof ParseError;
}

export function isFormMismatchError(error: unknown): error is FormMismatchError {
	return error instanceof FormMismatchError;
}
