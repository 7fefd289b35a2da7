import type { KubeConfig } from '@kubernetes/client-node';

export type ChallengeAction = 'Present' | 'CleanUp';

/** A DNS-01 challenge as handed over by cert-manager */
export interface ChallengeRequest {
  uid: string;
  action: ChallengeAction;
  type: string;
  /** Name being validated, e.g. `example.com` or `*.example.com` */
  dnsName: string;
  /** Value the TXT record must carry */
  key: string;
  /** Namespace secrets referenced by the config are read from */
  resourceNamespace: string;
  /** Record name to present, e.g. `_acme-challenge.example.com.` */
  resolvedFQDN: string;
  /** Zone owning `resolvedFQDN`, e.g. `example.com.` */
  resolvedZone: string;
  /** Whether credentials may come from the process environment */
  allowAmbientCredentials: boolean;
  /** Opaque per-issuer solver config */
  config?: unknown;
}

/** Contract a DNS-01 solver fulfils towards the webhook server */
export interface Solver {
  /** Name used to disambiguate solvers served under one group */
  name(): string;
  /** Called once at startup with the cluster connection settings */
  initialize(kubeConfig: KubeConfig): void;
  /** Publish the challenge record. Must tolerate replays. */
  present(request: ChallengeRequest): Promise<void>;
  /** Delete only the record(s) carrying `request.key` */
  cleanUp(request: ChallengeRequest): Promise<void>;
}
