import bytes from 'bytes';
import {z} from 'zod';

const ENV_SCHEMA = z.object({
  PORT: z.coerce.number().int().positive().default(5001),
  /**
   * Without a key, amounts are classified by the keyword rules only
   */
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default('o4-mini'),
  CLASSIFIER_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  CLASSIFIER_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  OCR_LANG: z.string().min(1).default('eng'),
  /**
   * Directory holding `<lang>.traineddata.gz`. Defaults to the bundled English
   * data, so any other OCR_LANG needs it set.
   */
  OCR_LANG_PATH: z.string().min(1).optional(),
  /**
   * Reported when the document carries no currency marker
   */
  DEFAULT_CURRENCY: z.string().min(1).optional(),
  /**
   * Largest accepted request body or uploaded file, e.g. "10mb". Parsed to a
   * byte count.
   */
  BODY_LIMIT: z
    .string()
    .min(1)
    .default('10mb')
    .transform((value, ctx) => {
      const limit = bytes.parse(value);
      if (limit === null || limit <= 0) {
        ctx.addIssue({code: z.ZodIssueCode.custom, message: 'Expected a size such as 10mb'});
        return z.NEVER;
      }
      return limit;
    }),
  SENTRY_DSN: z.string().url().optional(),
});

export type Env = z.infer<typeof ENV_SCHEMA>;

/**
 * Validates the process environment into a typed config. Empty values are
 * treated as unset so a copied `.env.example` works as is.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = ENV_SCHEMA.safeParse(present);

  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  return result.data;
}
