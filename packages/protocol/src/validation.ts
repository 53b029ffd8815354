/**
 * Configuration validation for fieldmeta builds
 */

import { z } from 'zod';
import type { AnnotationForm } from './types.js';

export type BuildForm = AnnotationForm | 'auto';

export type ConfigLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Build configuration (user input - all fields optional)
 */
export interface FieldMetaConfig {
	/** Annotation form for the build; `auto` picks it from the sources */
	form?: BuildForm;
	/** Source globs, relative to rootDir */
	include?: string[];
	/** tsconfig.json used to create the ts-morph project */
	tsConfigFilePath?: string;
	rootDir?: string;
	/** Output directory; modules are written beside their sources when unset */
	outDir?: string;
	outputSuffix?: string;
	/** Appended to each type name to form the exported binding */
	exportSuffix?: string;
	/** Module specifier emitted modules import createOperations from */
	runtimeModule?: string;
	logLevel?: ConfigLogLevel;
	/** Human-readable log lines instead of JSON */
	logPretty?: boolean;
	/** Log file; logs go to stderr when unset */
	logFile?: string;
}

/**
 * Configuration with defaults applied
 */
export interface ResolvedConfig {
	form: BuildForm;
	include: string[];
	tsConfigFilePath?: string;
	rootDir: string;
	outDir?: string;
	outputSuffix: string;
	exportSuffix: string;
	runtimeModule: string;
	logLevel: ConfigLogLevel;
	logPretty: boolean;
	logFile?: string;
}

export const DEFAULT_CONFIG: ResolvedConfig = {
	form: 'auto',
	include: ['src/**/*.ts'],
	rootDir: '.',
	outputSuffix: '.meta.ts',
	exportSuffix: 'Metadata',
	runtimeModule: '@fieldmeta/runtime',
	logLevel: 'warn',
	logPretty: false,
};

export class ConfigValidationError extends Error {
	constructor(
		message: string,
		public readonly field: string,
		public readonly value: unknown
	) {
		super(message);
		this.name = 'ConfigValidationError';
	}
}

const nonEmpty = (name: string) =>
	z
		.string({
			invalid_type_error: `${name} must be a string`,
		})
		.refine((val) => val.trim().length > 0, {
			message: `${name} cannot be empty`,
		});

/**
 * Zod schema for fieldmeta.config.json
 */
export const fieldMetaConfigSchema = z
	.object({
		form: z
			.enum(['label', 'meta', 'auto'], {
				errorMap: () => ({ message: 'form must be one of label, meta, auto' }),
			})
			.optional(),

		include: z
			.array(nonEmpty('include entry'), {
				invalid_type_error: 'include must be an array of globs',
			})
			.min(1, 'include must list at least one glob')
			.optional(),

		tsConfigFilePath: nonEmpty('tsConfigFilePath').optional(),
		rootDir: nonEmpty('rootDir').optional(),
		outDir: nonEmpty('outDir').optional(),

		outputSuffix: z
			.string({
				invalid_type_error: 'outputSuffix must be a string',
			})
			.regex(/^[\w.-]*\.ts$/, 'outputSuffix must end in .ts')
			.optional(),

		exportSuffix: z
			.string({
				invalid_type_error: 'exportSuffix must be a string',
			})
			.regex(/^[A-Za-z0-9_$]*$/, 'exportSuffix must be usable in an identifier')
			.optional(),

		runtimeModule: nonEmpty('runtimeModule').optional(),

		logLevel: z
			.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent'], {
				errorMap: () => ({ message: 'logLevel must be one of debug, info, warn, error, fatal, silent' }),
			})
			.optional(),

		logPretty: z
			.boolean({
				invalid_type_error: 'logPretty must be a boolean',
			})
			.optional(),

		logFile: nonEmpty('logFile').optional(),
	})
	.strict();

/**
 * Validates user configuration using Zod
 */
export function validateConfig(config: unknown): FieldMetaConfig {
	const result = fieldMetaConfigSchema.safeParse(config);
	if (!result.success) {
		const errors = result.error.errors.map((err) => err.message);
		const first = result.error.errors[0];
		throw new ConfigValidationError(
			`Invalid fieldmeta config: ${errors.join(', ')}`,
			first && first.path.length > 0 ? first.path.join('.') : 'config',
			config
		);
	}
	return result.data;
}

/**
 * Merges validated configuration layers over DEFAULT_CONFIG; later layers win
 */
export function resolveConfig(...layers: FieldMetaConfig[]): ResolvedConfig {
	const resolved: ResolvedConfig = { ...DEFAULT_CONFIG };
	for (const layer of layers) {
		for (const [key, value] of Object.entries(layer)) {
			if (value !== undefined) {
				Object.assign(resolved, { [key]: value });
			}
		}
	}
	return resolved;
}
