import { MetadataGenerator } from '../../generator/generator.js';
import { fail, loadBuildConfig, reportFailures, setupLogging, type BuildOptions } from '../options.js';

export function generateCommand(patterns: string[], options: BuildOptions): void {
	try {
		const config = loadBuildConfig(patterns, options);
		setupLogging(config);

		const generator = new MetadataGenerator(config);
		const report = generator.run();
		const ok = reportFailures(report);

		if (options.dryRun) {
			for (const generated of report.modules) {
				console.log(`Would write ${generated.outputPath} (${generated.typeNames.join(', ')})`);
			}
		} else {
			for (const path of generator.write(report)) {
				console.log(`✓ ${path}`);
			}
		}

		if (!ok) {
			process.exitCode = 1;
		}
	} catch (error) {
		fail(error);
	}
}
