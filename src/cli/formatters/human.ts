/**
 * Human-readable output formatter.
 */
import chalk from 'chalk';
import type { GenerateSummary, TargetResult } from '../../core/generate/types.js';
import { DocstampError, TemplateError, formatPosition } from '../../utils/errors.js';
import type { CheckReport, FormatOptions, IFormatter } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'dim' | 'bold';

export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatCheck(reports: readonly CheckReport[]): string {
    const lines: string[] = [];

    for (const report of reports) {
      if (report.error !== undefined || !report.outline) {
        lines.push(`${this.colorize('✗', 'red')} ${this.formatError(report.error, report.file)}`);
        continue;
      }

      const { outline } = report;
      const counts = [
        plural(outline.placeholders.length, 'placeholder'),
        plural(outline.loopCount, 'loop'),
      ];
      if (outline.escapedCount > 0) {
        counts.push(plural(outline.escapedCount, 'escaped tag'));
      }
      lines.push(`${this.colorize('✓', 'green')} ${report.file}: ${counts.join(', ')}`);

      if (this.options.verbose) {
        for (const key of outline.placeholders) {
          lines.push(`   ${this.colorize('key', 'dim')}  ${key}`);
        }
        for (const key of outline.loops) {
          lines.push(`   ${this.colorize('each', 'dim')} ${key}`);
        }
      }
    }

    const failed = reports.filter((r) => r.error !== undefined).length;
    if (reports.length > 1) {
      lines.push('');
      lines.push(
        `${this.colorize(`${reports.length - failed} passed`, 'green')}, ${this.colorize(`${failed} failed`, failed > 0 ? 'red' : 'dim')}`
      );
    }

    return lines.join('\n');
  }

  formatGenerate(summary: GenerateSummary, dryRun: boolean): string {
    const lines: string[] = [];

    if (dryRun) {
      lines.push(this.colorize('Dry Run - Would generate:', 'bold'));
      lines.push('');
    }

    for (const result of summary.results) {
      lines.push(...this.formatTarget(result));
    }

    if (summary.results.length === 0) {
      lines.push(this.colorize('No targets configured', 'yellow'));
    } else {
      lines.push('');
      lines.push(
        `${this.colorize(`${summary.generated.length} generated`, 'green')}, ${this.colorize(`${summary.failed.length} failed`, summary.failed.length > 0 ? 'red' : 'dim')}`
      );
    }

    return lines.join('\n');
  }

  formatError(error: unknown, file?: string): string {
    const location = file ? this.locate(error, file) : '';
    if (error instanceof DocstampError) {
      return `${location}${this.colorize(error.code, 'red')} ${error.message}`;
    }
    return `${location}${error instanceof Error ? error.message : 'Unknown error'}`;
  }

  private formatTarget(result: TargetResult): string[] {
    if (!result.success) {
      const code = result.errorCode ? `${this.colorize(result.errorCode, 'red')} ` : '';
      return [`${this.colorize('✗', 'red')} ${result.target}: ${code}${result.error ?? 'failed'}`];
    }

    const copied = result.copied.length > 0 ? `, ${result.copied.length} copied` : '';
    const lines = [
      `${this.colorize('✓', 'green')} ${result.target} → ${result.outputDir} (${plural(result.files.length, 'file')}${copied})`,
    ];
    if (this.options.verbose) {
      for (const file of result.files) {
        lines.push(`   ${file.template} ${this.colorize('→', 'dim')} ${file.output}`);
      }
      for (const file of result.copied) {
        lines.push(`   ${file} ${this.colorize('(copied)', 'dim')}`);
      }
    }
    return lines;
  }

  /** `file:line:col ` for positioned template errors, `file: ` otherwise. */
  private locate(error: unknown, file: string): string {
    if (error instanceof TemplateError && error.position) {
      return `${file}:${formatPosition(error.position)} `;
    }
    return `${file}: `;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
