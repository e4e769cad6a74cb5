/**
 * `docstamp generate`: render the configured targets.
 */
import { Command } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import { DocumentGenerator } from '../../core/generate/index.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';

interface GenerateCommandOptions {
  config?: string;
  dryRun?: boolean;
  json?: boolean;
  list?: boolean;
}

/**
 * Create the generate command.
 */
export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Render every template of the configured targets into their output directories')
    .argument('[targets...]', 'Target names (default: all targets)')
    .option('-c, --config <path>', 'Config file (default: .docstamp/config.yaml)')
    .option('--dry-run', 'Render without writing any files')
    .option('--json', 'Output as JSON')
    .option('-l, --list', 'List generated files')
    .action(async (targets: string[], options: GenerateCommandOptions) => {
      let failed: boolean;
      try {
        failed = await runGenerate(targets, options);
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      }
      if (failed) {
        process.exit(1);
      }
    });
}

async function runGenerate(targets: string[], options: GenerateCommandOptions): Promise<boolean> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  const generator = new DocumentGenerator(projectRoot, config);

  const dryRun = options.dryRun ?? false;
  const summary = await generator.generateAll(targets, { dryRun });

  const formatter = createFormatter({
    format: options.json ? 'json' : 'human',
    verbose: options.list ?? false,
  });
  console.log(formatter.formatGenerate(summary, dryRun));

  return summary.failed.length > 0;
}
