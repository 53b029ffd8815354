import { MetadataGenerator } from '../../generator/generator.js';
import { fail, loadBuildConfig, setupLogging, type BuildOptions } from '../options.js';

/**
 * Compiles one type and runs both of its operations
 */
export function inspectCommand(file: string, typeName: string, options: BuildOptions): void {
	try {
		const config = loadBuildConfig([], options);
		setupLogging(config);

		const compiled = new MetadataGenerator(config).compileType(file, typeName);
		compiled.operations.listFields();
		console.log(compiled.operations.toMetadataString());
	} catch (error) {
		fail(error);
	}
}
