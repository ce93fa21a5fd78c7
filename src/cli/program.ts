import { Command } from 'commander';
import { checkConfigCommand } from './commands/check-config.js';
import { featuresCommand } from './commands/features.js';

export function createProgram(): Command {
  const program = new Command();

  program.name('facetkit').description('Inspect facetkit logging configs and features').version('0.1.0');

  program
    .command('check-config')
    .description('Validate a TOML logging config and list its appenders')
    .argument('<file>', 'Path to the logging config')
    .option('--json', 'Print the validated document as JSON')
    .action(checkConfigCommand);

  program
    .command('features')
    .description('Show the resolved capability set')
    .argument('[list]', 'Comma separated capabilities (defaults to FACETKIT_FEATURES)')
    .option('-p, --profile <profile>', 'Build profile (debug, release)')
    .action(featuresCommand);

  return program;
}
