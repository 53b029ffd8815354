import type {
	AnnotationForm,
	CompileError,
	GeneratedOperations,
	MetadataTable,
	OutputSink,
	TypeDeclaration,
} from '@fieldmeta/protocol';

export type ExtractedMetadata =
	| { form: 'label'; fields: ReadonlyMap<string, string> }
	| { form: 'meta'; fields: ReadonlyMap<string, ReadonlyMap<string, string>> };

export interface CompiledType {
	declaration: TypeDeclaration;
	table: MetadataTable;
	operations: GeneratedOperations;
}

export type CompileResult = { ok: true; compiled: CompiledType } | { ok: false; error: CompileError };

export interface CompilerConfig {
	form: AnnotationForm;
	/** Default sink for the operations' listFields() */
	sink?: OutputSink;
}

export const DEFAULT_COMPILER_CONFIG: CompilerConfig = {
	form: 'meta',
};
