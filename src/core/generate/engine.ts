/**
 * Generator: renders every template of a target into its output directory.
 *
 * All templates of a target render in memory first. Rendered files and the
 * target's static files are then written to a fresh sibling temp directory, which is renamed over the output
 * directory, so a failing target leaves its previous output in place.
 */
import * as path from 'node:path';
import { ConfigError, DocstampError, SystemError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import {
  copyFile,
  globFiles,
  isDirectory,
  makeTempDir,
  readFile,
  removeDir,
  replaceDir,
  writeFile,
} from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { Config, TargetConfig } from '../config/schema.js';
import { selectTargets } from '../config/loader.js';
import { loadDataContext } from '../data/loader.js';
import { TemplateEngine } from '../template/engine.js';
import type { GenerateOptions, GenerateSummary, GeneratedFile, TargetResult } from './types.js';

interface RenderedFile extends GeneratedFile {
  content: string;
}

interface TargetPlan {
  sourceDir: string;
  rendered: RenderedFile[];
  copied: string[];
}

/** Carries the failing template's path out of renderTarget. */
class TemplateFailure extends Error {
  constructor(
    readonly template: string,
    readonly original: unknown
  ) {
    super(`${template}: ${errorMessage(original)}`);
    this.name = 'TemplateFailure';
  }
}

export class DocumentGenerator {
  private readonly engine: TemplateEngine;
  private readonly log = logger.child('generate');

  constructor(
    private readonly projectRoot: string,
    private readonly config: Config
  ) {
    this.engine = new TemplateEngine({ maxSteps: config.render.max_steps });
  }

  /**
   * Generate the named targets (all targets when `names` is empty).
   * A failing target is reported and the remaining targets still run.
   *
   * @throws ConfigError when a requested target name is not configured
   */
  async generateAll(names: readonly string[] = [], options: GenerateOptions = {}): Promise<GenerateSummary> {
    const targets = selectTargets(this.config, names);
    const results: TargetResult[] = [];

    for (const target of targets) {
      const result = await this.generateTarget(target, options);
      if (!result.success) {
        this.log.warn(`Failed to generate ${target.name}: ${result.error}`);
      }
      results.push(result);
    }

    return {
      results,
      generated: results.filter((r) => r.success).map((r) => r.target),
      failed: results.filter((r) => !r.success).map((r) => r.target),
    };
  }

  /**
   * Generate a single target.
   */
  async generateTarget(target: TargetConfig, options: GenerateOptions = {}): Promise<TargetResult> {
    const outputDir = this.resolveOutputDir(target);

    try {
      const plan = await this.renderTarget(target, outputDir);
      if (!options.dryRun) {
        await this.writeOutput(outputDir, plan);
      }
      this.log.debug(
        `Rendered ${plan.rendered.length} template(s) and copied ${plan.copied.length} file(s) for ${target.name}`,
        { outputDir }
      );
      return {
        target: target.name,
        success: true,
        outputDir,
        files: plan.rendered.map(({ template, output, length }) => ({ template, output, length })),
        copied: plan.copied,
      };
    } catch (error) {
      const original = error instanceof TemplateFailure ? error.original : error;
      return {
        target: target.name,
        success: false,
        outputDir,
        files: [],
        copied: [],
        template: error instanceof TemplateFailure ? error.template : undefined,
        error: errorMessage(error),
        errorCode: original instanceof DocstampError ? original.code : undefined,
      };
    }
  }

  /**
   * Template files of a source directory, relative to it, sorted.
   * Files under the output directory are skipped.
   */
  async findTemplates(sourceDir: string, outputDir: string): Promise<string[]> {
    const suffix = this.config.generate.template_suffix;
    const matches = await globFiles(`**/*${suffix}.*`, {
      cwd: sourceDir,
      ignore: sourceIgnores(sourceDir, outputDir),
      absolute: false,
    });
    return matches.filter((file) => this.outputName(file) !== undefined).sort();
  }

  /**
   * Files matched by a target's `static` patterns, relative to the source
   * directory, sorted. Templates and the output directory are skipped.
   */
  async findStaticFiles(target: TargetConfig, sourceDir: string, outputDir: string): Promise<string[]> {
    if (target.static.length === 0) {
      return [];
    }
    const matches = await globFiles(target.static, {
      cwd: sourceDir,
      ignore: sourceIgnores(sourceDir, outputDir),
      absolute: false,
    });
    return matches.filter((file) => this.outputName(file) === undefined).sort();
  }

  /**
   * Output path for a template path: `meta.tmp.typ` → `meta.typ`.
   * Returns undefined when the name has no suffix before its final extension.
   */
  outputName(templatePath: string): string | undefined {
    const suffix = this.config.generate.template_suffix;
    const ext = path.posix.extname(templatePath);
    const stem = templatePath.slice(0, templatePath.length - ext.length);
    if (ext === '' || !stem.endsWith(suffix) || path.posix.basename(stem) === suffix) {
      return undefined;
    }
    return stem.slice(0, stem.length - suffix.length) + ext;
  }

  private resolveOutputDir(target: TargetConfig): string {
    if (target.output) {
      return path.resolve(this.projectRoot, target.output);
    }
    return path.resolve(this.projectRoot, target.source, this.config.generate.output_dir);
  }

  private async renderTarget(target: TargetConfig, outputDir: string): Promise<TargetPlan> {
    const sourceDir = path.resolve(this.projectRoot, target.source);
    if (!(await isDirectory(sourceDir))) {
      throw new SystemError(
        ErrorCodes.FILE_NOT_FOUND,
        `Source directory not found: ${sourceDir}`,
        { target: target.name, sourceDir }
      );
    }

    const context = await loadDataContext(target.data.map((file) => path.resolve(this.projectRoot, file)));
    const templates = await this.findTemplates(sourceDir, outputDir);
    const rendered: RenderedFile[] = [];

    for (const template of templates) {
      const source = await readFile(path.join(sourceDir, template));
      let content: string;
      try {
        content = this.engine.render(source, context);
      } catch (error) {
        throw new TemplateFailure(template, error);
      }
      const output = this.outputName(template) ?? template;
      rendered.push({ template, output, length: content.length, content });
    }

    const copied = await this.findStaticFiles(target, sourceDir, outputDir);
    const outputs = new Set(rendered.map((file) => file.output));
    const clash = copied.find((file) => outputs.has(file));
    if (clash !== undefined) {
      throw new ConfigError(
        ErrorCodes.INVALID_CONFIG,
        `Static file '${clash}' would overwrite a rendered template output`,
        { target: target.name, file: clash }
      );
    }

    return { sourceDir, rendered, copied };
  }

  private async writeOutput(outputDir: string, plan: TargetPlan): Promise<void> {
    const tempDir = await makeTempDir('.docstamp-', path.dirname(outputDir));
    try {
      for (const file of plan.rendered) {
        await writeFile(path.join(tempDir, file.output), file.content);
      }
      for (const file of plan.copied) {
        await copyFile(path.join(plan.sourceDir, file), path.join(tempDir, file));
      }
      await replaceDir(tempDir, outputDir);
    } catch (error) {
      await removeDir(tempDir);
      throw new SystemError(
        ErrorCodes.WRITE_FAILED,
        `Failed to write ${outputDir}: ${errorMessage(error)}`,
        { outputDir }
      );
    }
  }
}

/** Glob ignores for a source directory: node_modules and the output directory when nested. */
function sourceIgnores(sourceDir: string, outputDir: string): string[] {
  const ignore = ['**/node_modules/**'];
  const outputRelative = path.relative(sourceDir, outputDir);
  if (outputRelative !== '' && !outputRelative.startsWith('..') && !path.isAbsolute(outputRelative)) {
    ignore.push(`${toPosix(outputRelative)}/**`);
  }
  return ignore;
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}
