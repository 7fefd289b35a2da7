export { ovhSolver, addTxtRecord, removeTxtRecord } from './ovh-solver.js';
export type { OvhSolverOptions } from './ovh-solver.js';
export { decodeConfig, validateConfig, emptyConfig } from './config.js';
export { kubernetesSecretStore, resolveSecret } from './secrets.js';
export type { SecretStore } from './secrets.js';
export { getSubDomain, unFqdn } from './domain.js';
export { clientCertificateError, createApp, handleChallenge, startServer } from './server.js';
export type {
  AppOptions,
  ChallengeResponse,
  ChallengePayloadResponse,
  ClientAuthOptions,
  PeerSocket,
} from './server.js';
export { loadOvhConfig, ovhConfigPaths } from './providers/ovh-config.js';
export { loadSettings } from './settings.js';
export type { Settings } from './settings.js';
export {
  WebhookError,
  ConfigDecodeError,
  ConfigValidationError,
  CredentialLookupError,
  SecretNotFoundError,
  SecretKeyMissingError,
  ZoneNotDeployedError,
  RemoteApiError,
  SettingsError,
} from './errors.js';
export { SOLVER_NAME, DEFAULT_TXT_TTL, OVH_ENDPOINTS } from './constants.js';
export type { ChallengeRequest, ChallengeAction, Solver } from './solver.js';
export type { ProviderConfig, SecretKeySelector, ZoneRecord, ZoneStatus } from './types.js';
