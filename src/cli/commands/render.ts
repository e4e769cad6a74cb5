/**
 * `docstamp render`: render one template against data files.
 */
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import { loadDataContext, parseOverride } from '../../core/data/loader.js';
import { TemplateEngine } from '../../core/template/engine.js';
import { readFile, writeFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';

interface RenderCommandOptions {
  data?: string[];
  set?: string[];
  output?: string;
  maxSteps?: number;
  json?: boolean;
}

/**
 * Commander argument parser for positive integers.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Create the render command.
 */
export function createRenderCommand(): Command {
  return new Command('render')
    .description('Render a template with TOML, YAML or JSON data')
    .argument('<template>', 'Template file to render')
    .option('-d, --data <files...>', 'Data files, merged left to right')
    .option('--set <assignments...>', 'Override string values, e.g. paper.title="Draft"')
    .option('-o, --output <file>', 'Write the result to a file instead of stdout')
    .option('--max-steps <n>', 'Step budget for rendering', parsePositiveInt)
    .option('--json', 'Report errors as JSON')
    .action(async (template: string, options: RenderCommandOptions) => {
      try {
        await runRender(template, options);
      } catch (error) {
        const formatter = createFormatter({ format: options.json ? 'json' : 'human' });
        if (options.json) {
          console.log(formatter.formatError(error, template));
        } else {
          log.error(formatter.formatError(error, template));
        }
        process.exit(1);
      }
    });
}

async function runRender(templatePath: string, options: RenderCommandOptions): Promise<void> {
  const config = await loadConfig(process.cwd());
  const overrides = (options.set ?? []).map(parseOverride);
  const context = await loadDataContext(options.data ?? [], overrides);
  const source = await readFile(templatePath);

  const engine = new TemplateEngine({ maxSteps: options.maxSteps ?? config.render.max_steps });
  const output = engine.render(source, context);

  if (options.output) {
    await writeFile(options.output, output);
    log.success(`Rendered ${templatePath} → ${options.output}`);
  } else {
    process.stdout.write(output);
  }
}
