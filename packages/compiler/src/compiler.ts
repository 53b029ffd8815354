import { isCompileError, type TypeDeclaration } from '@fieldmeta/protocol';
import { createOperations, log } from '@fieldmeta/runtime';
import { buildMetadataTable } from './pipeline/table-builder.js';
import { checkTypePlacement, extractMetadata } from './pipeline/annotation-extractor.js';
import { validateShape } from './pipeline/shape-validator.js';
import type { CompiledType, CompileResult, CompilerConfig } from './types.js';
import { DEFAULT_COMPILER_CONFIG } from './types.js';

/**
 * Runs a declaration through shape validation, annotation extraction and
 * table building, then synthesizes its operations
 */
export class FieldMetaCompiler {
	private config: CompilerConfig;

	constructor(config: Partial<CompilerConfig> = {}) {
		this.config = { ...DEFAULT_COMPILER_CONFIG, ...config };
	}

	get form() {
		return this.config.form;
	}

	compile(declaration: TypeDeclaration): CompiledType {
		validateShape(declaration);
		checkTypePlacement(declaration);

		const extracted = extractMetadata(declaration, this.config.form);
		const table = buildMetadataTable(declaration, extracted);

		log.debug('Compiled type', {
			type: declaration.name,
			form: table.form,
			fields: table.entries.length,
		});

		return {
			declaration,
			table,
			operations: createOperations(table, { sink: this.config.sink }),
		};
	}

	/**
	 * Like compile(), but returns compile errors instead of throwing them
	 */
	tryCompile(declaration: TypeDeclaration): CompileResult {
		try {
			return { ok: true, compiled: this.compile(declaration) };
		} catch (error) {
			if (isCompileError(error)) {
				log.debug('Type failed to compile', { type: declaration.name, error: error.message });
				return { ok: false, error };
			}
			throw error;
		}
	}
}

export function compileType(declaration: TypeDeclaration, config: Partial<CompilerConfig> = {}): CompiledType {
	return new FieldMetaCompiler(config).compile(declaration);
}
