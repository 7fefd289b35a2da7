import { createHash } from 'node:crypto';
import { DEFAULT_TXT_TTL, OVH_ENDPOINTS } from '../constants.js';
import { ConfigValidationError, RemoteApiError, ZoneNotDeployedError, errorMessage } from '../errors.js';
import { createChildLogger } from '../logger.js';
import type { ZoneRecord, ZoneStatus } from '../types.js';
import { loadOvhConfig, ovhConfigPaths } from './ovh-config.js';

export interface OvhOptions {
  /** Named endpoint (`ovh-eu`, `ovh-ca`, ...) or an absolute API base URL */
  endpoint: string;
  appKey: string;
  appSecret: string;
  consumerKey: string;
}

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

/** Signed access to the OVH API, paths relative to the endpoint base URL */
export interface OvhClient {
  readonly baseUrl: string;
  get<T>(path: string): Promise<T>;
  post<T>(path: string, body?: unknown): Promise<T>;
  delete<T>(path: string): Promise<T>;
}

const log = createChildLogger({ service: 'OvhClient' });

/** Environment variables consulted for ambient credentials */
const AMBIENT_ENV = {
  endpoint: 'OVH_ENDPOINT',
  appKey: 'OVH_APPLICATION_KEY',
  appSecret: 'OVH_APPLICATION_SECRET',
  consumerKey: 'OVH_CONSUMER_KEY',
} as const satisfies Record<keyof OvhOptions, string>;

function ovhSignature(
  appSecret: string,
  consumerKey: string,
  method: string,
  url: string,
  body: string,
  timestamp: number
): string {
  const raw = `${appSecret}+${consumerKey}+${method}+${url}+${body}+${timestamp}`;
  const hash = createHash('sha1').update(raw).digest('hex');
  return `$1$${hash}`;
}

/**
 * Resolve an endpoint name to its API base URL.
 * Absolute http(s) URLs are taken as-is, without a trailing slash.
 */
export function resolveEndpoint(endpoint: string): string {
  const known = OVH_ENDPOINTS[endpoint];
  if (known) return known;

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new ConfigValidationError('endpoint', `unknown OVH endpoint "${endpoint}"`);
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ConfigValidationError('endpoint', `unknown OVH endpoint "${endpoint}"`);
  }
  return endpoint.replace(/\/+$/, '');
}

export interface AmbientSources {
  env?: NodeJS.ProcessEnv;
  /** `ovh.conf` files, lowest priority first */
  configPaths?: readonly string[];
}

/**
 * Fill empty options from the environment, then from `ovh.conf` files.
 *
 * The endpoint comes from `OVH_ENDPOINT` or `[default] endpoint` and falls
 * back to `ovh-eu`; keys are read from the section named after the endpoint.
 */
export async function withAmbientCredentials(
  options: OvhOptions,
  sources: AmbientSources = {}
): Promise<OvhOptions> {
  const env = sources.env ?? process.env;
  const sections = await loadOvhConfig(sources.configPaths ?? ovhConfigPaths());

  const endpoint =
    options.endpoint || env[AMBIENT_ENV.endpoint] || sections['default']?.['endpoint'] || 'ovh-eu';
  const fromFile = sections[endpoint] ?? {};

  return {
    endpoint,
    appKey: options.appKey || env[AMBIENT_ENV.appKey] || fromFile['application_key'] || '',
    appSecret: options.appSecret || env[AMBIENT_ENV.appSecret] || fromFile['application_secret'] || '',
    consumerKey: options.consumerKey || env[AMBIENT_ENV.consumerKey] || fromFile['consumer_key'] || '',
  };
}

/**
 * Create an OVH API client.
 *
 * Uses the OVH signature authentication scheme. The clock delta to the OVH
 * server is measured with `/auth/time` on the first signed call and reused
 * for the lifetime of the client.
 */
export function ovhClient(options: OvhOptions): OvhClient {
  const { appKey, appSecret, consumerKey } = options;

  if (!options.endpoint) throw new ConfigValidationError('endpoint');
  if (!appKey) throw new ConfigValidationError('application key');
  if (!appSecret) throw new ConfigValidationError('application secret');
  if (!consumerKey) throw new ConfigValidationError('consumer key');

  const baseUrl = resolveEndpoint(options.endpoint);

  let timeDelta: Promise<number> | undefined;

  async function fetchTimeDelta(): Promise<number> {
    const path = '/auth/time';
    let res: Response;
    try {
      res = await fetch(`${baseUrl}${path}`);
    } catch (err) {
      throw new RemoteApiError('GET', path, errorMessage(err), undefined, { cause: err });
    }
    if (!res.ok) {
      const text = await res.text();
      throw new RemoteApiError('GET', path, `${res.status}: ${text}`, res.status);
    }
    const serverTime = Number(await res.json());
    if (!Number.isFinite(serverTime)) {
      throw new RemoteApiError('GET', path, 'invalid server time');
    }
    return serverTime - Math.floor(Date.now() / 1000);
  }

  async function getTimestamp(): Promise<number> {
    if (!timeDelta) {
      timeDelta = fetchTimeDelta();
    }
    return Math.floor(Date.now() / 1000) + (await timeDelta);
  }

  async function apiFetch<T>(method: HttpMethod, path: string, body?: unknown): Promise<T> {
    const url = `${baseUrl}${path}`;
    const bodyStr = body !== undefined ? JSON.stringify(body) : '';
    const timestamp = await getTimestamp();
    const signature = ovhSignature(appSecret, consumerKey, method, url, bodyStr, timestamp);

    const headers: Record<string, string> = {
      'X-Ovh-Application': appKey,
      'X-Ovh-Consumer': consumerKey,
      'X-Ovh-Timestamp': String(timestamp),
      'X-Ovh-Signature': signature,
      'Content-Type': 'application/json',
    };

    log.debug({ method, path }, 'OVH API call');

    let res: Response;
    try {
      res = await fetch(url, {
        method,
        headers,
        ...(bodyStr ? { body: bodyStr } : {}),
      });
    } catch (err) {
      throw new RemoteApiError(method, path, errorMessage(err), undefined, { cause: err });
    }

    const text = await res.text();
    if (!res.ok) {
      throw new RemoteApiError(method, path, `${res.status}: ${apiErrorDetail(text)}`, res.status);
    }
    if (!text) return undefined as T;
    try {
      return JSON.parse(text) as T;
    } catch (err) {
      throw new RemoteApiError(method, path, `invalid JSON response: ${errorMessage(err)}`, res.status, {
        cause: err,
      });
    }
  }

  return {
    baseUrl,
    get: <T>(path: string) => apiFetch<T>('GET', path),
    post: <T>(path: string, body?: unknown) => apiFetch<T>('POST', path, body),
    delete: <T>(path: string) => apiFetch<T>('DELETE', path),
  };
}

/** OVH errors come back as `{"message": "..."}`; fall back to the raw body */
function apiErrorDetail(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'message' in parsed &&
      typeof parsed.message === 'string'
    ) {
      return parsed.message;
    }
  } catch {
    // not JSON
  }
  return text;
}

function zonePath(domain: string): string {
  return `/domain/zone/${encodeURIComponent(domain)}`;
}

/**
 * Check that the zone is deployed; a zone with a pending deployment must
 * not be edited.
 */
export async function validateZone(client: OvhClient, domain: string): Promise<void> {
  const status = await client.get<ZoneStatus | undefined>(`${zonePath(domain)}/status`);
  if (!status?.isDeployed) {
    throw new ZoneNotDeployedError(domain);
  }
}

/** IDs of the records of a type at a subdomain, in provider order */
export async function listRecords(
  client: OvhClient,
  domain: string,
  fieldType: string,
  subDomain: string
): Promise<number[]> {
  const query = `fieldType=${encodeURIComponent(fieldType)}&subDomain=${encodeURIComponent(subDomain)}`;
  const ids = await client.get<number[] | undefined>(`${zonePath(domain)}/record?${query}`);
  return ids ?? [];
}

export async function getRecord(client: OvhClient, domain: string, id: number): Promise<ZoneRecord> {
  const path = `${zonePath(domain)}/record/${id}`;
  const record = await client.get<ZoneRecord | undefined>(path);
  if (!record) {
    throw new RemoteApiError('GET', path, 'empty response');
  }
  return record;
}

export async function createRecord(
  client: OvhClient,
  domain: string,
  fieldType: string,
  subDomain: string,
  target: string
): Promise<ZoneRecord> {
  const params: ZoneRecord = {
    fieldType,
    subDomain,
    target,
    ttl: DEFAULT_TXT_TTL,
  };
  return client.post<ZoneRecord>(`${zonePath(domain)}/record`, params);
}

export async function deleteRecord(client: OvhClient, domain: string, id: number): Promise<void> {
  await client.delete<void>(`${zonePath(domain)}/record/${id}`);
}

/** Publish pending edits of the zone */
export async function refreshZone(client: OvhClient, domain: string): Promise<void> {
  await client.post<void>(`${zonePath(domain)}/refresh`);
}
