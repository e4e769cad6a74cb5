/**
 * `docstamp check`: tokenize templates and report syntax errors.
 */
import { Command } from 'commander';
import { compile } from '../../core/template/engine.js';
import { readFile } from '../../utils/file-system.js';
import { createFormatter } from '../formatters/index.js';
import type { CheckReport } from '../formatters/index.js';

interface CheckCommandOptions {
  json?: boolean;
  list?: boolean;
}

/**
 * Check one template file without rendering it.
 */
export async function checkTemplate(file: string): Promise<CheckReport> {
  try {
    const source = await readFile(file);
    return { file, outline: compile(source).outline() };
  } catch (error) {
    return { file, error };
  }
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check template syntax and list the keys each template uses')
    .argument('<templates...>', 'Template files to check')
    .option('--json', 'Output as JSON')
    .option('-l, --list', 'List the keys each template references')
    .action(async (templates: string[], options: CheckCommandOptions) => {
      const reports: CheckReport[] = [];
      for (const file of templates) {
        reports.push(await checkTemplate(file));
      }

      const formatter = createFormatter({
        format: options.json ? 'json' : 'human',
        verbose: options.list ?? false,
      });
      console.log(formatter.formatCheck(reports));

      if (reports.some((r) => r.error !== undefined)) {
        process.exit(1);
      }
    });
}
