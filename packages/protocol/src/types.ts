/**
 * Structural category of a declaration handed to the compiler
 */
export type DeclarationShape = 'NamedFields' | 'PositionalFields' | 'NoFields';

/**
 * Annotation syntax in use for a build.
 * `label` is the single override string form, `meta` the key/value form.
 */
export type AnnotationForm = 'label' | 'meta';

export interface SourceLocation {
	file: string;
	line: number;
}

/**
 * Raw annotation argument as the front end found it
 */
export type AnnotationArgument =
	/** A literal string value, already unquoted */
	| { kind: 'string'; value: string }
	/** Free text (e.g. a JSDoc tag comment) that may still carry quotes */
	| { kind: 'text'; text: string }
	| { kind: 'object'; properties: AnnotationProperty[] }
	/** Any other expression, kept as source text for diagnostics */
	| { kind: 'unsupported'; text: string };

export interface AnnotationProperty {
	key: string;
	value: AnnotationArgument;
}

export interface AnnotationToken {
	form: AnnotationForm;
	/** Name as written in source, e.g. `Meta` or `meta` */
	name: string;
	arguments: AnnotationArgument[];
	location?: SourceLocation;
}

export interface FieldDeclaration {
	name: string;
	annotations: AnnotationToken[];
	location?: SourceLocation;
}

export interface TypeDeclaration {
	name: string;
	shape: DeclarationShape;
	fields: FieldDeclaration[];
	/** Type-level annotations; any recognized token here is rejected */
	annotations: AnnotationToken[];
	location?: SourceLocation;
}

export type FieldMetadata = string | ReadonlyMap<string, string>;

export interface TableEntry<M extends FieldMetadata> {
	readonly field: string;
	readonly metadata: M;
}

export interface LabelTable {
	readonly typeName: string;
	readonly form: 'label';
	readonly entries: readonly TableEntry<string>[];
}

export interface MetaTable {
	readonly typeName: string;
	readonly form: 'meta';
	readonly entries: readonly TableEntry<ReadonlyMap<string, string>>[];
}

/**
 * Declaration-ordered (field, metadata) pairs for one type
 */
export type MetadataTable = LabelTable | MetaTable;

/**
 * Receives one line of output per call
 */
export type OutputSink = (line: string) => void;

export interface GeneratedOperations {
	readonly typeName: string;
	/** Writes each field name, in declaration order, one line per field */
	listFields(sink?: OutputSink): void;
	toMetadataString(): string;
}
