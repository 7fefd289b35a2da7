import { CoreV1Api, type KubeConfig, type V1Secret } from '@kubernetes/client-node';
import {
  CredentialLookupError,
  SecretKeyMissingError,
  SecretNotFoundError,
  errorMessage,
} from './errors.js';
import type { SecretKeySelector } from './types.js';

/** Read access to namespaced secrets */
export interface SecretStore {
  /**
   * Fetch the decoded fields of a secret.
   * Rejects with {@link SecretNotFoundError} when it does not exist.
   */
  getSecretData(namespace: string, name: string): Promise<Record<string, Buffer>>;
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 404
  );
}

/**
 * Secret store backed by the Kubernetes core API.
 */
export function kubernetesSecretStore(kubeConfig: KubeConfig): SecretStore {
  const api = kubeConfig.makeApiClient(CoreV1Api);

  return {
    async getSecretData(namespace, name) {
      let secret: V1Secret;
      try {
        secret = await api.readNamespacedSecret({ name, namespace });
      } catch (err) {
        if (isNotFound(err)) {
          throw new SecretNotFoundError(namespace, name, { cause: err });
        }
        throw new CredentialLookupError(
          `failed to read secret "${namespace}/${name}": ${errorMessage(err)}`,
          { cause: err }
        );
      }

      const data: Record<string, Buffer> = {};
      for (const [field, encoded] of Object.entries(secret.data ?? {})) {
        data[field] = Buffer.from(encoded, 'base64');
      }
      return data;
    },
  };
}

/**
 * Resolve the value a secret reference points at.
 *
 * An empty reference name means no secret is configured and resolves to an
 * empty string without reading the store.
 */
export async function resolveSecret(
  store: SecretStore | undefined,
  ref: SecretKeySelector,
  namespace: string
): Promise<string> {
  if (!ref.name) {
    return '';
  }
  if (!store) {
    throw new CredentialLookupError('solver not initialized: no secret store available');
  }

  const data = await store.getSecretData(namespace, ref.name);
  const value = data[ref.key];
  if (value === undefined) {
    throw new SecretKeyMissingError(namespace, ref.name, ref.key);
  }
  return value.toString('utf8');
}
