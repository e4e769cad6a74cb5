/**
 * JSON output formatter for machine consumption.
 */
import type { GenerateSummary } from '../../core/generate/types.js';
import { DocstampError, TemplateError } from '../../utils/errors.js';
import type { CheckReport, IFormatter } from './types.js';

export class JsonFormatter implements IFormatter {
  formatCheck(reports: readonly CheckReport[]): string {
    return JSON.stringify(
      {
        passed: reports.filter((r) => r.error === undefined).length,
        failed: reports.filter((r) => r.error !== undefined).length,
        files: reports.map((report) =>
          report.error !== undefined
            ? { file: report.file, status: 'fail', error: this.transformError(report.error) }
            : { file: report.file, status: 'pass', ...report.outline }
        ),
      },
      null,
      2
    );
  }

  formatGenerate(summary: GenerateSummary, dryRun: boolean): string {
    return JSON.stringify(
      {
        dry_run: dryRun,
        generated: summary.generated,
        failed: summary.failed,
        targets: summary.results.map((r) => ({
          target: r.target,
          status: r.success ? 'pass' : 'fail',
          output_dir: r.outputDir,
          files: r.files,
          copied: r.copied,
          template: r.template,
          code: r.errorCode,
          error: r.error,
        })),
      },
      null,
      2
    );
  }

  formatError(error: unknown, file?: string): string {
    return JSON.stringify({ file, error: this.transformError(error) }, null, 2);
  }

  private transformError(error: unknown): Record<string, unknown> {
    if (error instanceof TemplateError) {
      return {
        code: error.code,
        kind: error.kind,
        message: error.message,
        path: error.path,
        expected: error.expected,
        actual: error.actual,
        line: error.position?.line,
        column: error.position?.column,
        offset: error.position?.offset,
      };
    }
    if (error instanceof DocstampError) {
      return { code: error.code, message: error.message };
    }
    return { message: error instanceof Error ? error.message : 'Unknown error' };
  }
}
