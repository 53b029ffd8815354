import { MetadataGenerator } from '../../generator/generator.js';
import { fail, loadBuildConfig, reportFailures, setupLogging, type BuildOptions } from '../options.js';

export function checkCommand(patterns: string[], options: BuildOptions): void {
	try {
		const config = loadBuildConfig(patterns, options);
		setupLogging(config);

		const report = new MetadataGenerator(config).run();
		if (!reportFailures(report)) {
			process.exitCode = 1;
			return;
		}

		const types = report.modules.reduce((count, generated) => count + generated.typeNames.length, 0);
		console.log(`✓ ${types} type(s) in ${report.modules.length} file(s) compile with the ${report.form} form`);
	} catch (error) {
		fail(error);
	}
}
