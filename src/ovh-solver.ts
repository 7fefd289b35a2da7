import type { KubeConfig } from '@kubernetes/client-node';
import { decodeConfig, validateConfig } from './config.js';
import { SOLVER_NAME, TXT_FIELD_TYPE } from './constants.js';
import { getSubDomain, unFqdn } from './domain.js';
import { createChildLogger } from './logger.js';
import {
  createRecord,
  deleteRecord,
  getRecord,
  listRecords,
  ovhClient,
  refreshZone,
  validateZone,
  withAmbientCredentials,
  type OvhClient,
} from './providers/ovh.js';
import { kubernetesSecretStore, resolveSecret, type SecretStore } from './secrets.js';
import type { ChallengeRequest, Solver } from './solver.js';

export interface OvhSolverOptions {
  /** Secret store to use instead of the one built by `initialize` */
  secretStore?: SecretStore;
  /** Environment read for ambient credentials */
  env?: NodeJS.ProcessEnv;
  /** `ovh.conf` files read for ambient credentials, lowest priority first */
  configPaths?: readonly string[];
}

const log = createChildLogger({ service: 'OvhSolver' });

/**
 * Publish a TXT record and refresh the zone.
 *
 * Nothing is created when the zone has a deployment in progress. Duplicates
 * are not checked for: replays add identical records, all removed by
 * {@link removeTxtRecord}.
 */
export async function addTxtRecord(
  client: OvhClient,
  domain: string,
  subDomain: string,
  target: string
): Promise<void> {
  await validateZone(client, domain);
  const record = await createRecord(client, domain, TXT_FIELD_TYPE, subDomain, target);
  log.debug({ zone: domain, subDomain, id: record?.id }, 'TXT record created');
  await refreshZone(client, domain);
}

/**
 * Delete the TXT records at `subDomain` whose value is exactly `target`,
 * then refresh the zone. Records with other values are left alone so that
 * concurrent challenges for the same name do not clobber each other.
 *
 * Stops at the first failing call; the zone is then not refreshed.
 *
 * @returns the number of records deleted
 */
export async function removeTxtRecord(
  client: OvhClient,
  domain: string,
  subDomain: string,
  target: string
): Promise<number> {
  const ids = await listRecords(client, domain, TXT_FIELD_TYPE, subDomain);

  let deleted = 0;
  for (const id of ids) {
    const record = await getRecord(client, domain, id);
    if (record.target !== target) {
      continue;
    }
    await deleteRecord(client, domain, id);
    deleted++;
  }

  await refreshZone(client, domain);
  return deleted;
}

/**
 * Create the cert-manager solver for OVH zones.
 *
 * The API client is rebuilt from the challenge config on every call so that
 * rotated secrets are always picked up.
 */
export function ovhSolver(options: OvhSolverOptions = {}): Solver & {
  buildClient(request: ChallengeRequest): Promise<OvhClient>;
} {
  let secretStore = options.secretStore;
  const env = options.env ?? process.env;

  async function buildClient(request: ChallengeRequest): Promise<OvhClient> {
    const cfg = decodeConfig(request.config);
    validateConfig(cfg, request.allowAmbientCredentials);

    const appSecret = await resolveSecret(
      secretStore,
      cfg.applicationSecretRef,
      request.resourceNamespace
    );

    const clientOptions = {
      endpoint: cfg.endpoint,
      appKey: cfg.applicationKey,
      appSecret,
      consumerKey: cfg.consumerKey,
    };
    return ovhClient(
      request.allowAmbientCredentials
        ? await withAmbientCredentials(clientOptions, { env, configPaths: options.configPaths })
        : clientOptions
    );
  }

  function target(request: ChallengeRequest): { domain: string; subDomain: string } {
    const domain = unFqdn(request.resolvedZone);
    return { domain, subDomain: getSubDomain(domain, request.resolvedFQDN) };
  }

  return {
    buildClient,

    name() {
      return SOLVER_NAME;
    },

    initialize(kubeConfig: KubeConfig) {
      secretStore = options.secretStore ?? kubernetesSecretStore(kubeConfig);
    },

    async present(request) {
      const client = await buildClient(request);
      const { domain, subDomain } = target(request);
      log.info({ uid: request.uid, zone: domain, subDomain }, 'Presenting challenge record');
      await addTxtRecord(client, domain, subDomain, request.key);
    },

    async cleanUp(request) {
      const client = await buildClient(request);
      const { domain, subDomain } = target(request);
      log.info({ uid: request.uid, zone: domain, subDomain }, 'Cleaning up challenge record');
      const deleted = await removeTxtRecord(client, domain, subDomain, request.key);
      log.info({ uid: request.uid, zone: domain, subDomain, count: deleted }, 'Challenge records removed');
    },
  };
}
