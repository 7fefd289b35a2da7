/** Reference to one field of a namespaced Kubernetes Secret */
export interface SecretKeySelector {
  name: string;
  key: string;
}

/** Per-issuer solver configuration decoded from the challenge `config` */
export interface ProviderConfig {
  /** Named OVH endpoint (e.g. `ovh-eu`) or an absolute API base URL */
  endpoint: string;
  applicationKey: string;
  applicationSecretRef: SecretKeySelector;
  consumerKey: string;
}

/** A record entry of an OVH zone */
export interface ZoneRecord {
  /** Assigned by OVH, absent until created */
  id?: number;
  fieldType: string;
  subDomain: string;
  target: string;
  ttl?: number;
}

/** Publication status of an OVH zone */
export interface ZoneStatus {
  isDeployed: boolean;
}
