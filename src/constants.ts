/** Name the solver is referenced by on an ACME issuer (`solverName: ovh`) */
export const SOLVER_NAME = 'ovh';

/** API version of the ChallengePayload objects exchanged with cert-manager */
export const CHALLENGE_PAYLOAD_API_VERSION = 'webhook.acme.cert-manager.io/v1alpha1';

/** Version of the solver API group served to the cluster */
export const SOLVER_GROUP_VERSION = 'v1alpha1';

/** Kind of the objects exchanged with cert-manager */
export const CHALLENGE_PAYLOAD_KIND = 'ChallengePayload';

/** Record type managed by the solver */
export const TXT_FIELD_TYPE = 'TXT';

/** TTL, in seconds, given to challenge records on creation */
export const DEFAULT_TXT_TTL = 60;

/** Named OVH API endpoints accepted in the `endpoint` config field */
export const OVH_ENDPOINTS: Readonly<Record<string, string>> = {
  'ovh-eu': 'https://eu.api.ovh.com/1.0',
  'ovh-ca': 'https://ca.api.ovh.com/1.0',
  'ovh-us': 'https://api.us.ovhcloud.com/1.0',
  'kimsufi-eu': 'https://eu.api.kimsufi.com/1.0',
  'kimsufi-ca': 'https://ca.api.kimsufi.com/1.0',
  'soyoustart-eu': 'https://eu.api.soyoustart.com/1.0',
  'soyoustart-ca': 'https://ca.api.soyoustart.com/1.0',
};
