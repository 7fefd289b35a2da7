import { z } from 'zod';
import { ConfigDecodeError, ConfigValidationError, errorMessage } from './errors.js';
import type { ProviderConfig } from './types.js';

// Absent and null fields both decode to their zero value
const optionalString = z.string().nullish().transform((value) => value ?? '');

const secretKeySelectorSchema = z.object({
  name: optionalString,
  key: optionalString,
});

export const providerConfigSchema = z.object({
  endpoint: optionalString,
  applicationKey: optionalString,
  applicationSecretRef: secretKeySelectorSchema
    .nullish()
    .transform((ref) => ref ?? { name: '', key: '' }),
  consumerKey: optionalString,
});

/** Config used when the issuer provides none */
export function emptyConfig(): ProviderConfig {
  return {
    endpoint: '',
    applicationKey: '',
    applicationSecretRef: { name: '', key: '' },
    consumerKey: '',
  };
}

/**
 * Decode the opaque solver config of a challenge.
 *
 * Accepts raw JSON (string or bytes) or an already-parsed value. An absent
 * config is valid and yields empty fields; checking them is left to
 * {@link validateConfig}.
 */
export function decodeConfig(raw: unknown): ProviderConfig {
  if (raw === undefined || raw === null) {
    return emptyConfig();
  }

  let value: unknown = raw;
  if (typeof raw === 'string' || Buffer.isBuffer(raw)) {
    try {
      value = JSON.parse(raw.toString());
    } catch (err) {
      throw new ConfigDecodeError(errorMessage(err), { cause: err });
    }
    if (value === null) {
      return emptyConfig();
    }
  }

  const parsed = providerConfigSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue
      ? `${issue.path.join('.') || '(root)'}: ${issue.message}`
      : parsed.error.message;
    throw new ConfigDecodeError(detail, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Ensure every credential field is set, unless the request allows the client
 * to pick missing values up from the environment.
 */
export function validateConfig(
  cfg: ProviderConfig,
  allowAmbientCredentials: boolean
): void {
  if (allowAmbientCredentials) return;

  if (!cfg.endpoint) throw new ConfigValidationError('endpoint');
  if (!cfg.applicationKey) throw new ConfigValidationError('application key');
  if (!cfg.applicationSecretRef.name) {
    throw new ConfigValidationError('application secret');
  }
  if (!cfg.consumerKey) throw new ConfigValidationError('consumer key');
}
