/**
 * CLI program definition.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createRenderCommand } from './commands/render.js';
import { createCheckCommand } from './commands/check.js';
import { createGenerateCommand } from './commands/generate.js';
import { logger } from '../utils/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('docstamp')
    .description('Render text templates from TOML, YAML or JSON data')
    .version(readVersion())
    .option('--verbose', 'Show debug logging')
    .option('--quiet', 'Only show errors')
    .hook('preAction', (thisCommand) => {
      const { verbose, quiet } = thisCommand.opts<GlobalOptions>();
      if (verbose) {
        logger.setLevel('debug');
      } else if (quiet) {
        logger.setLevel('error');
      }
    });

  [createRenderCommand, createCheckCommand, createGenerateCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
