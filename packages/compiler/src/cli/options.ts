import { resolveConfig, validateConfig, type CompileError, type ResolvedConfig } from '@fieldmeta/protocol';
import { initializeLogger } from '@fieldmeta/runtime';
import { loadConfigFile } from '../config.js';
import type { GenerationReport } from '../generator/generator.js';

export interface BuildOptions {
	form?: string;
	outDir?: string;
	config?: string;
	tsconfig?: string;
	logLevel?: string;
	prettyLogs?: boolean;
	logFile?: string;
	dryRun?: boolean;
}

/**
 * Config file values overridden by command-line options
 */
export function loadBuildConfig(patterns: string[], options: BuildOptions, cwd?: string): ResolvedConfig {
	const fileConfig = loadConfigFile(options.config, cwd);
	const overrides = validateConfig({
		form: options.form,
		outDir: options.outDir,
		tsConfigFilePath: options.tsconfig,
		logLevel: options.logLevel,
		logPretty: options.prettyLogs,
		logFile: options.logFile,
		include: patterns.length > 0 ? patterns : undefined,
	});
	return resolveConfig(fileConfig, overrides);
}

/**
 * Logs go to stderr unless a log file is configured, keeping stdout for command output
 */
export function setupLogging(config: ResolvedConfig): void {
	initializeLogger({
		level: config.logLevel,
		pretty: config.logPretty,
		destination: config.logFile ?? 'stderr',
	});
}

export function formatCompileError(error: CompileError): string {
	return `  ✗ ${error.name}: ${error.message}`;
}

/**
 * Prints every failure; returns true when the build had none
 */
export function reportFailures(report: GenerationReport): boolean {
	for (const failure of report.failures) {
		console.error(`✗ ${failure.sourcePath}`);
		for (const error of failure.errors) {
			console.error(formatCompileError(error));
		}
	}
	return report.failures.length === 0;
}

export function fail(error: unknown): void {
	console.error('✗', error instanceof Error ? error.message : error);
	process.exitCode = 1;
}
