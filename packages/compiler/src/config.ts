import { existsSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { ConfigValidationError, validateConfig, type FieldMetaConfig } from '@fieldmeta/protocol';

export const CONFIG_FILE_NAME = 'fieldmeta.config.json';

/**
 * Loads and validates a config file. Paths in it are taken relative to the
 * file's directory. A missing default file yields an empty config; a missing
 * explicit one is an error.
 */
export function loadConfigFile(configPath?: string, cwd: string = process.cwd()): FieldMetaConfig {
	const target = resolve(cwd, configPath ?? CONFIG_FILE_NAME);
	if (!existsSync(target)) {
		if (configPath !== undefined) {
			throw new ConfigValidationError(`Config file not found: ${target}`, 'config', configPath);
		}
		return {};
	}

	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(target, 'utf-8'));
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new ConfigValidationError(`Config file ${target} is not valid JSON: ${message}`, 'config', target);
	}

	const config = validateConfig(raw);
	const baseDir = dirname(target);
	return {
		...config,
		rootDir: resolve(baseDir, config.rootDir ?? '.'),
		tsConfigFilePath: config.tsConfigFilePath ? resolve(baseDir, config.tsConfigFilePath) : undefined,
		logFile: config.logFile ? resolve(baseDir, config.logFile) : undefined,
	};
}
