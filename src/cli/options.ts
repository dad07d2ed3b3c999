import { z } from 'zod';
import { DepweaveError } from '../graph/errors';
import { config } from '../utils/config';
import { normalizeExtension } from '../utils/path-filters';

export class CliOptionsError extends DepweaveError {}

/** Commander argument parser for comma-separated, repeatable list options. */
export function collectList(value: string, previous: string[] = []): string[] {
  return [...previous, ...value.split(',').map(item => item.trim())];
}

const pathList = (flag: string) =>
  z.array(z.string().trim().min(1, `${flag} entries cannot be empty`)).default([]);

const extensionList = (flag: string) =>
  z
    .array(z.string().trim().min(1, `${flag} entries cannot be empty`))
    .default([])
    .transform(extensions => Array.from(new Set(extensions.map(normalizeExtension))));

const selectionShape = {
  repo: z.string().trim().min(1).default('.'),
  allowOutsideRepo: z.boolean().default(false),
  commit: z.string().trim().min(1, '--commit cannot be empty').optional(),
  input: pathList('--input'),
  exclude: pathList('--exclude'),
  includeExt: extensionList('--include-ext'),
  excludeExt: extensionList('--exclude-ext'),
  between: pathList('--between'),
  file: z.string().trim().min(1, '--file cannot be empty').optional(),
  level: z.coerce.number().int('--level must be an integer').min(1, '--level must be at least 1').default(1),
};

const selectionObject = z.object(selectionShape);

function checkSelection(value: z.infer<typeof selectionObject>, ctx: z.RefinementCtx): void {
  if (value.between.length > 0 && value.input.length > 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: '--between cannot be used with --input flag' });
  }
  if (value.file !== undefined && value.between.length > 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: '--file cannot be used with --between flag' });
  }
  if (value.file !== undefined && value.input.length > 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: '--file cannot be used with --input flag' });
  }
}

export const selectionOptionsSchema = selectionObject.superRefine(checkSelection);

export const showOptionsSchema = z
  .object({
    ...selectionShape,
    format: z.enum(['dot', 'mermaid', 'json']).default(config.graph.defaultFormat),
    url: z.boolean().default(false),
  })
  .superRefine(checkSelection);

export const cyclesOptionsSchema = z
  .object({
    ...selectionShape,
    failOnCycle: z.boolean().default(false),
  })
  .superRefine(checkSelection);

export type SelectionOptions = z.infer<typeof selectionOptionsSchema>;
export type ShowOptions = z.infer<typeof showOptionsSchema>;
export type CyclesOptions = z.infer<typeof cyclesOptionsSchema>;

function optionsError(error: z.ZodError): CliOptionsError {
  return new CliOptionsError(error.issues.map(issue => issue.message).join('; '));
}

export function parseShowOptions(raw: unknown): ShowOptions {
  const result = showOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw optionsError(result.error);
  }
  return result.data;
}

export function parseCyclesOptions(raw: unknown): CyclesOptions {
  const result = cyclesOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw optionsError(result.error);
  }
  return result.data;
}
