import { mkdirSync, writeFileSync } from 'fs';
import { dirname, relative, resolve, sep } from 'path';
import type { Project } from 'ts-morph';
import type { AnnotationForm, CompileError, ResolvedConfig, TypeDeclaration } from '@fieldmeta/protocol';
import { log } from '@fieldmeta/runtime';
import { FieldMetaCompiler } from '../compiler.js';
import { emitModule } from '../emitter/module-emitter.js';
import { isGeneratedPath, outputPathFor } from '../emitter/paths.js';
import { readDeclarations } from '../frontend/declaration-reader.js';
import { createProject } from '../frontend/project.js';
import type { CompiledType } from '../types.js';
import { resolveBuildForm } from './form.js';

/**
 * Described declarations of one source file (a compilation unit)
 */
export interface SourceUnit {
	sourcePath: string;
	declarations: TypeDeclaration[];
	errors: CompileError[];
}

export interface GeneratedModule {
	sourcePath: string;
	outputPath: string;
	typeNames: string[];
	content: string;
}

export interface UnitFailure {
	sourcePath: string;
	errors: CompileError[];
}

export interface GenerationReport {
	form: AnnotationForm;
	modules: GeneratedModule[];
	failures: UnitFailure[];
}

export class MetadataGenerator {
	private readonly project: Project;

	constructor(
		private readonly config: ResolvedConfig,
		project?: Project
	) {
		this.project = project ?? createProject(config);
	}

	readUnits(): SourceUnit[] {
		return this.project
			.getSourceFiles()
			.filter((sourceFile) => !isGeneratedPath(sourceFile.getFilePath(), this.config))
			.map((sourceFile) => ({ sourcePath: sourceFile.getFilePath(), ...readDeclarations(sourceFile) }))
			.filter((unit) => unit.declarations.length > 0 || unit.errors.length > 0);
	}

	/**
	 * Compiles every unit. A unit with any failing type produces no module.
	 */
	run(): GenerationReport {
		const units = this.readUnits();
		const form = this.resolveForm(units);
		const compiler = new FieldMetaCompiler({ form });
		const report: GenerationReport = { form, modules: [], failures: [] };

		for (const unit of units) {
			const unitLog = log.child({ source: unit.sourcePath });
			const errors = [...unit.errors];
			const compiled: CompiledType[] = [];

			for (const declaration of unit.declarations) {
				const result = compiler.tryCompile(declaration);
				if (result.ok) {
					compiled.push(result.compiled);
				} else {
					errors.push(result.error);
				}
			}

			if (errors.length > 0) {
				unitLog.warn('Compilation unit failed', { errors: errors.map((error) => error.message) });
				report.failures.push({ sourcePath: unit.sourcePath, errors });
				continue;
			}

			report.modules.push({
				sourcePath: unit.sourcePath,
				outputPath: outputPathFor(unit.sourcePath, this.config),
				typeNames: compiled.map((type) => type.table.typeName),
				content: emitModule(compiled, {
					sourceLabel: this.sourceLabel(unit.sourcePath),
					exportSuffix: this.config.exportSuffix,
					runtimeModule: this.config.runtimeModule,
				}),
			});
		}

		log.debug('Generation finished', {
			form,
			modules: report.modules.length,
			failures: report.failures.length,
		});
		return report;
	}

	/**
	 * Compiles a single described type of a source file, throwing its compile error
	 */
	compileType(sourcePath: string, typeName: string): CompiledType {
		const path = resolve(this.config.rootDir, sourcePath);
		const sourceFile = this.project.getSourceFile(path) ?? this.project.addSourceFileAtPath(path);
		const { declarations, errors } = readDeclarations(sourceFile);

		const failed = errors.find((error) => error.typeName === typeName);
		if (failed) {
			throw failed;
		}

		const declaration = declarations.find((candidate) => candidate.name === typeName);
		if (!declaration) {
			throw new Error(`No described type "${typeName}" in ${sourcePath}`);
		}

		return new FieldMetaCompiler({ form: this.resolveForm(this.readUnits()) }).compile(declaration);
	}

	write(report: GenerationReport): string[] {
		const written: string[] = [];
		for (const generated of report.modules) {
			mkdirSync(dirname(generated.outputPath), { recursive: true });
			writeFileSync(generated.outputPath, generated.content, 'utf-8');
			log.info('Wrote metadata module', { output: generated.outputPath, types: generated.typeNames });
			written.push(generated.outputPath);
		}
		return written;
	}

	/**
	 * Form of the whole build, shared by run() and compileType()
	 */
	private resolveForm(units: SourceUnit[]): AnnotationForm {
		return resolveBuildForm(
			this.config.form,
			units.flatMap((unit) => unit.declarations)
		);
	}

	private sourceLabel(sourcePath: string): string {
		return relative(resolve(this.config.rootDir), sourcePath).split(sep).join('/');
	}
}
