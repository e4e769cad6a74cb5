/**
 * Project configuration schema.
 */
import { z } from 'zod';
import { DEFAULT_MAX_STEPS } from '../template/types.js';

/**
 * Helper to create an optional object field with schema defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Rendering limits. */
export const RenderConfigSchema = z.object({
  /** Maximum tokens processed per render call */
  max_steps: z.number().int().positive().default(DEFAULT_MAX_STEPS),
});

/** Generator settings shared by all targets. */
export const GenerateConfigSchema = z.object({
  /** Marker before the final extension: meta.tmp.typ → meta.typ */
  template_suffix: z
    .string()
    .regex(/^\.[A-Za-z0-9_-]+$/, 'must look like ".tmp"')
    .default('.tmp'),
  /** Output directory, relative to each target's source directory */
  output_dir: z.string().min(1).default('_generated'),
});

/** One generation target: a template directory plus its data. */
export const TargetSchema = z.object({
  name: z.string().min(1),
  /** Directory holding templates, relative to the project root */
  source: z.string().min(1),
  /** Data files merged left to right */
  data: z.union([z.string(), z.array(z.string())]).default([]).transform((d) => (typeof d === 'string' ? [d] : d)),
  /** Files copied verbatim into the output, as paths or globs relative to the source directory */
  static: z.union([z.string(), z.array(z.string())]).default([]).transform((s) => (typeof s === 'string' ? [s] : s)),
  /** Output directory relative to the project root; overrides generate.output_dir */
  output: z.string().min(1).optional(),
});

export const ConfigSchema = z.object({
  render: withDefaults(RenderConfigSchema),
  generate: withDefaults(GenerateConfigSchema),
  targets: z.array(TargetSchema).default([]).superRefine((targets, ctx) => {
    const seen = new Set<string>();
    targets.forEach((target, i) => {
      if (seen.has(target.name)) {
        ctx.addIssue({ code: 'custom', message: `duplicate target name '${target.name}'`, path: [i, 'name'] });
      }
      seen.add(target.name);
    });
  }),
});

export type RenderConfig = z.infer<typeof RenderConfigSchema>;
export type GenerateConfig = z.infer<typeof GenerateConfigSchema>;
export type TargetConfig = z.infer<typeof TargetSchema>;
export type Config = z.infer<typeof ConfigSchema>;
