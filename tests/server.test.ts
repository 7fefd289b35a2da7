import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import http from 'node:http';
import type { AddressInfo } from 'node:net';
import { pino } from 'pino';
import { ZoneNotDeployedError } from '../src/errors.js';
import { clientCertificateError, createApp, handleChallenge, type PeerSocket } from '../src/server.js';
import type { ChallengeRequest, Solver } from '../src/solver.js';

const silent = pino({ level: 'silent' });

const solver = {
  name: () => 'ovh',
  initialize: vi.fn(),
  present: vi.fn(async (_request: ChallengeRequest) => {}),
  cleanUp: vi.fn(async (_request: ChallengeRequest) => {}),
} satisfies Solver;

const request = {
  uid: 'c0ffee',
  action: 'Present',
  type: 'dns-01',
  dnsName: 'example.com',
  key: 'token-1',
  resourceNamespace: 'cert-manager',
  resolvedFQDN: '_acme-challenge.example.com.',
  resolvedZone: 'example.com.',
  allowAmbientCredentials: false,
  config: { endpoint: 'ovh-eu' },
} satisfies ChallengeRequest;

let server: http.Server;
let baseUrl: string;

beforeAll(async () => {
  const app = createApp({ groupName: 'acme.example.com', solvers: [solver], logger: silent });
  server = http.createServer(app);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const { port } = server.address() as AddressInfo;
  baseUrl = `http://127.0.0.1:${port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

beforeEach(() => {
  solver.present.mockReset();
  solver.cleanUp.mockReset();
});

function postPayload(body: unknown, path = '/apis/acme.example.com/v1alpha1/ovh') {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

const payload = {
  apiVersion: 'webhook.acme.cert-manager.io/v1alpha1',
  kind: 'ChallengePayload',
  request,
};

describe('webhook server', () => {
  it('answers health checks', async () => {
    const res = await fetch(`${baseUrl}/healthz`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('ok');
  });

  it('runs Present on the named solver', async () => {
    const res = await postPayload(payload);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      apiVersion: 'webhook.acme.cert-manager.io/v1alpha1',
      kind: 'ChallengePayload',
      response: { uid: 'c0ffee', success: true },
    });
    expect(solver.present).toHaveBeenCalledWith(request);
    expect(solver.cleanUp).not.toHaveBeenCalled();
  });

  it('runs CleanUp on the named solver', async () => {
    const res = await postPayload({ ...payload, request: { ...request, action: 'CleanUp' } });

    expect(res.status).toBe(200);
    expect(solver.cleanUp).toHaveBeenCalledWith({ ...request, action: 'CleanUp' });
    expect(solver.present).not.toHaveBeenCalled();
  });

  it('reports solver errors in the response', async () => {
    solver.present.mockRejectedValueOnce(new ZoneNotDeployedError('example.com'));

    const res = await postPayload(payload);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      apiVersion: 'webhook.acme.cert-manager.io/v1alpha1',
      kind: 'ChallengePayload',
      response: {
        uid: 'c0ffee',
        success: false,
        status: {
          message: 'OVH zone not deployed for domain example.com',
          reason: 'Failure',
          code: 500,
        },
      },
    });
  });

  it('defaults optional request fields', async () => {
    const res = await postPayload({
      request: {
        action: 'Present',
        key: 'token-1',
        resolvedFQDN: '_acme-challenge.example.com.',
        resolvedZone: 'example.com.',
      },
    });

    expect(res.status).toBe(200);
    expect(solver.present).toHaveBeenCalledWith({
      uid: '',
      action: 'Present',
      type: 'dns-01',
      dnsName: '',
      key: 'token-1',
      resourceNamespace: '',
      resolvedFQDN: '_acme-challenge.example.com.',
      resolvedZone: 'example.com.',
      allowAmbientCredentials: false,
    });
  });

  it('rejects an unknown action', async () => {
    const res = await postPayload({ ...payload, request: { ...request, action: 'Remove' } });

    expect(res.status).toBe(400);
    expect(solver.present).not.toHaveBeenCalled();
  });

  it('rejects malformed JSON', async () => {
    const res = await postPayload('{"request":');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid JSON in request body' });
  });

  it('returns 404 for another group', async () => {
    const res = await postPayload(payload, '/apis/other.example.com/v1alpha1/ovh');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: 'solver "ovh" not found in group "other.example.com"',
    });
  });

  it('returns 404 for an unknown solver', async () => {
    const res = await postPayload(payload, '/apis/acme.example.com/v1alpha1/cloudflare');

    expect(res.status).toBe(404);
    expect(solver.present).not.toHaveBeenCalled();
  });

  it('reports the status of body parser errors', async () => {
    const res = await postPayload({ ...payload, request: { ...request, key: 'x'.repeat(1024 * 1024) } });

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'request entity too large' });
    expect(solver.present).not.toHaveBeenCalled();
  });

  it('returns 404 for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/metrics`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'GET /metrics not found' });
  });
});

describe('API discovery', () => {
  const groupVersion = {
    groupVersion: 'acme.example.com/v1alpha1',
    version: 'v1alpha1',
  };
  const group = {
    kind: 'APIGroup',
    apiVersion: 'v1',
    name: 'acme.example.com',
    versions: [groupVersion],
    preferredVersion: groupVersion,
  };

  it('lists the solver group', async () => {
    const res = await fetch(`${baseUrl}/apis`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ kind: 'APIGroupList', apiVersion: 'v1', groups: [group] });
  });

  it('describes the solver group', async () => {
    const res = await fetch(`${baseUrl}/apis/acme.example.com`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(group);
  });

  it('lists one resource per solver', async () => {
    const res = await fetch(`${baseUrl}/apis/acme.example.com/v1alpha1`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      kind: 'APIResourceList',
      apiVersion: 'v1',
      groupVersion: 'acme.example.com/v1alpha1',
      resources: [
        {
          name: 'ovh',
          singularName: 'ovh',
          namespaced: false,
          kind: 'ChallengePayload',
          verbs: ['create'],
        },
      ],
    });
  });

  it('returns 404 for another group', async () => {
    const res = await fetch(`${baseUrl}/apis/other.example.com/v1alpha1`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'group "other.example.com" not found' });
  });
});

describe('client authentication', () => {
  let authServer: http.Server;
  let authUrl: string;

  beforeAll(async () => {
    const app = createApp({
      groupName: 'acme.example.com',
      solvers: [solver],
      logger: silent,
      clientAuth: { allowedNames: ['front-proxy-client'] },
    });
    authServer = http.createServer(app);
    await new Promise<void>((resolve) => authServer.listen(0, '127.0.0.1', resolve));
    const { port } = authServer.address() as AddressInfo;
    authUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
      authServer.close((err) => (err ? reject(err) : resolve()))
    );
  });

  it('rejects challenges without a client certificate', async () => {
    const res = await fetch(`${authUrl}/apis/acme.example.com/v1alpha1/ovh`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ ...payload, request: { ...request, resourceNamespace: 'kube-system' } }),
    });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: 'client certificate required' });
    expect(solver.present).not.toHaveBeenCalled();
  });

  it('rejects discovery without a client certificate', async () => {
    const res = await fetch(`${authUrl}/apis/acme.example.com/v1alpha1`);

    expect(res.status).toBe(401);
  });

  it('keeps health checks open', async () => {
    const res = await fetch(`${authUrl}/healthz`);

    expect(res.status).toBe(200);
  });
});

describe('clientCertificateError', () => {
  function peer(authorized: boolean, commonName?: string): PeerSocket {
    return {
      authorized,
      getPeerCertificate: () => (commonName === undefined ? {} : { subject: { CN: commonName } }),
    };
  }

  it('requires a socket', () => {
    expect(clientCertificateError(undefined, [])).toBe('client certificate required');
  });

  it('requires a verified certificate', () => {
    expect(clientCertificateError(peer(false, 'front-proxy-client'), [])).toBe(
      'client certificate required'
    );
  });

  it('accepts any verified certificate without allowed names', () => {
    expect(clientCertificateError(peer(true, 'anyone'), [])).toBeUndefined();
  });

  it('checks the common name against allowed names', () => {
    expect(clientCertificateError(peer(true, 'front-proxy-client'), ['front-proxy-client'])).toBeUndefined();
    expect(clientCertificateError(peer(true, 'intruder'), ['front-proxy-client'])).toBe(
      'client certificate "intruder" is not allowed'
    );
    expect(clientCertificateError(peer(true), ['front-proxy-client'])).toBe(
      'client certificate "" is not allowed'
    );
  });
});

describe('handleChallenge', () => {
  it('stringifies non-Error failures', async () => {
    const failing: Solver = {
      ...solver,
      present: () => Promise.reject('quota exceeded'),
    };

    await expect(handleChallenge(failing, request, silent)).resolves.toEqual({
      uid: 'c0ffee',
      success: false,
      status: { message: 'quota exceeded', reason: 'Failure', code: 500 },
    });
  });
});
