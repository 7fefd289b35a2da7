import { z } from 'zod';
import { SettingsError } from './errors.js';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const settingsSchema = z.object({
  groupName: z.string().trim().min(1, 'GROUP_NAME must be specified'),
  port: z.coerce.number().int().min(1).max(65535).default(443),
  tlsCertFile: z.string().min(1).optional(),
  tlsKeyFile: z.string().min(1).optional(),
  requestheaderClientCaFile: z.string().min(1).optional(),
  requestheaderAllowedNames: z.array(z.string().min(1)).default([]),
  logLevel: logLevelSchema.default('info'),
});

export type Settings = Readonly<z.infer<typeof settingsSchema>>;

/** Treat empty variables as unset */
function env(source: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = source[key];
  return value === '' ? undefined : value;
}

/**
 * Read the process settings once at startup.
 *
 * @throws {SettingsError} when `GROUP_NAME` is missing or a value is invalid
 */
export function loadSettings(source: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse({
    groupName: source['GROUP_NAME'] ?? '',
    port: env(source, 'PORT'),
    tlsCertFile: env(source, 'TLS_CERT_FILE'),
    tlsKeyFile: env(source, 'TLS_KEY_FILE'),
    requestheaderClientCaFile: env(source, 'REQUESTHEADER_CLIENT_CA_FILE'),
    requestheaderAllowedNames: env(source, 'REQUESTHEADER_ALLOWED_NAMES')
      ?.split(',')
      .map((name) => name.trim())
      .filter((name) => name !== ''),
    logLevel: env(source, 'LOG_LEVEL')?.toLowerCase(),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new SettingsError(`invalid settings: ${issues.join('; ')}`, { cause: parsed.error });
  }

  if ((parsed.data.tlsCertFile === undefined) !== (parsed.data.tlsKeyFile === undefined)) {
    throw new SettingsError('invalid settings: TLS_CERT_FILE and TLS_KEY_FILE must be set together');
  }

  if (parsed.data.requestheaderClientCaFile !== undefined && parsed.data.tlsCertFile === undefined) {
    throw new SettingsError(
      'invalid settings: REQUESTHEADER_CLIENT_CA_FILE requires TLS_CERT_FILE and TLS_KEY_FILE'
    );
  }

  return Object.freeze(parsed.data);
}
