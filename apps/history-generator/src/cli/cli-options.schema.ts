import { z } from 'zod';
import { CRASH_DISTRIBUTIONS } from '@shared/kernel/GeneratorConfig';

const MAX_SEED = 0xffffffff;

export const DEFAULT_COUNT = 50;
export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 50;

const integerFlag = (flag: string, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z
    .string({ invalid_type_error: `--${flag} expects a single value` })
    .regex(/^\d+$/, `--${flag} must be a non-negative integer`)
    .transform(Number)
    .pipe(
      z
        .number()
        .int()
        .min(min, `--${flag} must be >= ${min}`)
        .max(max, `--${flag} must be <= ${max}`),
    );

const booleanFlag = (flag: string, fallback: boolean) =>
  z.boolean({ invalid_type_error: `--${flag} given more than once` }).default(fallback);

export const cliOptionsSchema = z
  .object({
    history: booleanFlag('history', false),
    recent: booleanFlag('recent', false),
    count: integerFlag('count', 0).optional(),
    page: integerFlag('page', 1).optional(),
    'page-size': integerFlag('page-size', 1).optional(),
    total: integerFlag('total', 0).optional(),
    output: z
      .string({ invalid_type_error: '--output expects a single path' })
      .min(1, '--output must not be empty')
      .optional(),
    pretty: booleanFlag('pretty', true),
    seed: integerFlag('seed', 0, MAX_SEED).optional(),
    distribution: z
      .enum(CRASH_DISTRIBUTIONS, {
        errorMap: () => ({ message: `--distribution must be one of: ${CRASH_DISTRIBUTIONS.join(', ')}` }),
      })
      .optional(),
    help: booleanFlag('help', false),
  })
  .superRefine((options, ctx) => {
    // The padded total can reach page * pageSize + pageSize - 1
    const page = options.page ?? DEFAULT_PAGE;
    const pageSize = options['page-size'] ?? DEFAULT_PAGE_SIZE;
    if (page * pageSize + pageSize > Number.MAX_SAFE_INTEGER) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['page'],
        message: `--page and --page-size reach past record ${Number.MAX_SAFE_INTEGER}`,
      });
    }
  });

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export const STRING_FLAGS = ['count', 'page', 'page-size', 'total', 'output', 'seed', 'distribution'];
export const BOOLEAN_FLAGS = ['history', 'recent', 'pretty', 'help'];
