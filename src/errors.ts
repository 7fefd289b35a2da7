/** Base class for every error raised by the webhook */
export class WebhookError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The per-issuer config payload is not valid JSON or has mistyped fields */
export class ConfigDecodeError extends WebhookError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`error decoding OVH config: ${detail}`, options);
  }
}

/** A field required without ambient credentials is empty */
export class ConfigValidationError extends WebhookError {
  constructor(
    readonly field: string,
    message = `no ${field} provided in OVH config`
  ) {
    super(message);
  }
}

/** The credential store could not produce the application secret */
export class CredentialLookupError extends WebhookError {}

export class SecretNotFoundError extends CredentialLookupError {
  constructor(
    readonly namespace: string,
    readonly secretName: string,
    options?: { cause?: unknown }
  ) {
    super(`secret "${namespace}/${secretName}" not found`, options);
  }
}

export class SecretKeyMissingError extends CredentialLookupError {
  constructor(
    readonly namespace: string,
    readonly secretName: string,
    readonly key: string
  ) {
    super(`key not found "${key}" in secret '${namespace}/${secretName}'`);
  }
}

/** The zone has a deployment in progress and must not be mutated */
export class ZoneNotDeployedError extends WebhookError {
  constructor(readonly domain: string) {
    super(`OVH zone not deployed for domain ${domain}`);
  }
}

/**
 * A call against the OVH API failed, either in transport or with a non-2xx
 * status. `status` is absent for transport failures.
 */
export class RemoteApiError extends WebhookError {
  constructor(
    readonly method: string,
    readonly path: string,
    detail: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(`OVH API call failed: ${method} ${path} - ${detail}`, options);
  }
}

/** Process settings are missing or invalid at startup */
export class SettingsError extends WebhookError {}

/** Render any thrown value as a message */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
