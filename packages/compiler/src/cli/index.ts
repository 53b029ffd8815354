import { Command } from 'commander';
import { VERSION } from '../version.js';
import { checkCommand } from './commands/check.js';
import { generateCommand } from './commands/generate.js';
import { inspectCommand } from './commands/inspect.js';

function addBuildOptions(command: Command): Command {
	return command
		.option('--form <form>', 'Annotation form: label, meta or auto')
		.option('-c, --config <path>', 'Config file (default: fieldmeta.config.json)')
		.option('-p, --tsconfig <path>', 'tsconfig.json used to load sources')
		.option('--log-level <level>', 'debug, info, warn, error, fatal or silent')
		.option('--pretty-logs', 'Human-readable log lines instead of JSON')
		.option('--log-file <path>', 'Write logs to a file instead of stderr');
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name('fieldmeta')
		.description('Generate field listing and metadata operations for described TypeScript types')
		.version(VERSION);

	addBuildOptions(
		program
			.command('generate')
			.description('Compile described types and write their metadata modules')
			.argument('[patterns...]', 'Source globs (default: config include)')
			.option('-o, --out-dir <dir>', 'Output directory (default: beside each source)')
			.option('--dry-run', 'Compile and list outputs without writing them')
	).action(generateCommand);

	addBuildOptions(
		program
			.command('check')
			.description('Compile described types without writing anything')
			.argument('[patterns...]', 'Source globs (default: config include)')
	).action(checkCommand);

	addBuildOptions(
		program
			.command('inspect')
			.description('Print the field list and metadata string of one type')
			.argument('<file>', 'Source file declaring the type')
			.argument('<type>', 'Name of the described type')
	).action(inspectCommand);

	return program;
}
