import { z } from 'zod';

const required = (field: string) =>
  z.string({ required_error: `${field} is required` }).trim().min(1, `${field} must not be empty`);

/**
 * Zod schema for the streaming config file.
 *
 * Exactly one authentication mode must be present: a key-pair
 * (`private_key_file`, optional `private_key_passphrase`) or a
 * programmatic access token (`pat_token`). Unknown keys are stripped.
 */
export const streamingConfigSchema = z
  .object({
    account: required('account'),
    user: required('user'),
    database: required('database'),
    schema: required('schema'),
    pipe: required('pipe'),
    url: z.string().url().optional(),
    channel_name: z.string().trim().min(1).optional(),
    private_key_file: z.string().trim().min(1).optional(),
    private_key_passphrase: z.string().optional(),
    pat_token: z.string().trim().min(1).optional(),
  })
  .superRefine((cfg, ctx) => {
    const hasKey = cfg.private_key_file !== undefined;
    const hasPat = cfg.pat_token !== undefined;
    if (!hasKey && !hasPat) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Either pat_token or private_key_file must be provided',
        path: ['pat_token'],
      });
    } else if (hasKey && hasPat) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'pat_token and private_key_file are mutually exclusive',
        path: ['pat_token'],
      });
    }
  });

export type StreamingConfig = z.infer<typeof streamingConfigSchema>;

export const DEFAULT_CHANNEL_NAME = 'SENSEHAT_CHNL';

/**
 * Authentication mode derived from a validated config.
 * Discriminated so callers never see both credentials at once.
 */
export type AuthMode =
  | { kind: 'pat'; token: string }
  | { kind: 'keypair'; privateKeyFile: string; passphrase?: string | undefined };

export function authModeOf(config: StreamingConfig): AuthMode {
  if (config.pat_token !== undefined) {
    return { kind: 'pat', token: config.pat_token };
  }
  if (config.private_key_file !== undefined) {
    return {
      kind: 'keypair',
      privateKeyFile: config.private_key_file,
      passphrase: config.private_key_passphrase,
    };
  }
  throw new Error('Config has no authentication mode; validate with streamingConfigSchema first');
}

/** Control-plane base URL: the explicit `url`, else the account's default host. */
export function controlPlaneUrl(config: StreamingConfig): string {
  const base = config.url ?? `https://${config.account.toLowerCase()}.snowflakecomputing.com`;
  return base.replace(/\/+$/, '');
}
