import { readFileSync } from 'node:fs';
import http from 'node:http';
import https from 'node:https';
import { TLSSocket } from 'node:tls';
import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import type { Logger } from 'pino';
import { z } from 'zod';
import {
  CHALLENGE_PAYLOAD_API_VERSION,
  CHALLENGE_PAYLOAD_KIND,
  SOLVER_GROUP_VERSION,
} from './constants.js';
import { errorMessage } from './errors.js';
import { createChildLogger } from './logger.js';
import type { Settings } from './settings.js';
import type { ChallengeRequest, Solver } from './solver.js';

export const challengeRequestSchema = z.object({
  uid: z.string().default(''),
  action: z.enum(['Present', 'CleanUp']),
  type: z.string().default('dns-01'),
  dnsName: z.string().default(''),
  key: z.string(),
  resourceNamespace: z.string().default(''),
  resolvedFQDN: z.string(),
  resolvedZone: z.string(),
  allowAmbientCredentials: z.boolean().default(false),
  config: z.unknown().optional(),
});

export const challengePayloadSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.string().optional(),
  request: challengeRequestSchema,
});

export interface ChallengeStatus {
  message: string;
  reason: string;
  code: number;
}

export interface ChallengeResponse {
  uid: string;
  success: boolean;
  status?: ChallengeStatus;
}

export interface ChallengePayloadResponse {
  apiVersion: string;
  kind: string;
  response: ChallengeResponse;
}

export interface ClientAuthOptions {
  /** Accepted certificate common names; empty accepts any certificate the CA signed */
  allowedNames: readonly string[];
}

export interface AppOptions {
  /** API group the solvers are served under */
  groupName: string;
  solvers: Solver[];
  logger?: Logger;
  /** Require a verified client certificate on every `/apis` route */
  clientAuth?: ClientAuthOptions;
}

/** The parts of a TLS socket that identify the caller */
export interface PeerSocket {
  authorized: boolean;
  getPeerCertificate(): { subject?: { CN?: string } };
}

/**
 * Why the caller on `socket` is refused, or `undefined` when its certificate
 * was verified against the client CA and its name is allowed.
 */
export function clientCertificateError(
  socket: PeerSocket | undefined,
  allowedNames: readonly string[]
): string | undefined {
  if (!socket?.authorized) {
    return 'client certificate required';
  }
  if (allowedNames.length === 0) return undefined;

  const commonName = socket.getPeerCertificate().subject?.CN;
  if (commonName === undefined || !allowedNames.includes(commonName)) {
    return `client certificate "${commonName ?? ''}" is not allowed`;
  }
  return undefined;
}

function requireClientCertificate(clientAuth: ClientAuthOptions, logger: Logger): RequestHandler {
  return (req, res, next) => {
    const socket = req.socket instanceof TLSSocket ? req.socket : undefined;
    const reason = clientCertificateError(socket, clientAuth.allowedNames);
    if (reason) {
      logger.warn({ method: req.method, path: req.path, reason }, 'Request rejected');
      res.status(401).json({ error: reason });
      return;
    }
    next();
  };
}

/** HTTP status carried by an error, as set by body-parser and http-errors */
function httpStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status = 'statusCode' in err ? err.statusCode : 'status' in err ? err.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : undefined;
}

function apiGroup(group: string) {
  const version = { groupVersion: `${group}/${SOLVER_GROUP_VERSION}`, version: SOLVER_GROUP_VERSION };
  return { kind: 'APIGroup', apiVersion: 'v1', name: group, versions: [version], preferredVersion: version };
}

/**
 * Run one challenge against a solver and describe the outcome the way
 * cert-manager expects it. Solver errors become `success: false`.
 */
export async function handleChallenge(
  solver: Solver,
  request: ChallengeRequest,
  logger: Logger
): Promise<ChallengeResponse> {
  try {
    if (request.action === 'Present') {
      await solver.present(request);
    } else {
      await solver.cleanUp(request);
    }
    return { uid: request.uid, success: true };
  } catch (err) {
    logger.error(
      { err, uid: request.uid, action: request.action, fqdn: request.resolvedFQDN },
      'Challenge failed'
    );
    return {
      uid: request.uid,
      success: false,
      status: { message: errorMessage(err), reason: 'Failure', code: 500 },
    };
  }
}

/**
 * Build the webhook HTTP application.
 *
 * Routes:
 * - `GET /apis`, `GET /apis/{group}`, `GET /apis/{group}/v1alpha1` API discovery
 * - `POST /apis/{group}/v1alpha1/{solver}` runs a ChallengePayload
 * - `GET /healthz` liveness, never authenticated
 */
export function createApp(options: AppOptions): express.Express {
  const logger = options.logger ?? createChildLogger({ service: 'WebhookServer' });
  const solvers = new Map(options.solvers.map((solver) => [solver.name(), solver]));

  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  app.get('/healthz', (_req, res) => {
    res.type('text/plain').send('ok');
  });

  if (options.clientAuth) {
    app.use('/apis', requireClientCertificate(options.clientAuth, logger));
  }

  app.get('/apis', (_req, res) => {
    res.json({ kind: 'APIGroupList', apiVersion: 'v1', groups: [apiGroup(options.groupName)] });
  });

  app.get('/apis/:group', (req, res) => {
    const { group } = req.params;
    if (group !== options.groupName) {
      res.status(404).json({ error: `group "${group}" not found` });
      return;
    }
    res.json(apiGroup(group));
  });

  app.get(`/apis/:group/${SOLVER_GROUP_VERSION}`, (req, res) => {
    const { group } = req.params;
    if (group !== options.groupName) {
      res.status(404).json({ error: `group "${group}" not found` });
      return;
    }
    res.json({
      kind: 'APIResourceList',
      apiVersion: 'v1',
      groupVersion: `${group}/${SOLVER_GROUP_VERSION}`,
      resources: [...solvers.keys()].map((name) => ({
        name,
        singularName: name,
        namespaced: false,
        kind: CHALLENGE_PAYLOAD_KIND,
        verbs: ['create'],
      })),
    });
  });

  app.post(`/apis/:group/${SOLVER_GROUP_VERSION}/:solver`, async (req, res, next) => {
    try {
      const { group, solver: solverName } = req.params;
      const solver = solvers.get(solverName);
      if (group !== options.groupName || !solver) {
        res.status(404).json({ error: `solver "${solverName}" not found in group "${group}"` });
        return;
      }

      const parsed = challengePayloadSchema.safeParse(req.body);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        res.status(400).json({
          error: issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid ChallengePayload',
        });
        return;
      }

      const request = parsed.data.request;
      logger.info(
        {
          uid: request.uid,
          action: request.action,
          solver: solverName,
          fqdn: request.resolvedFQDN,
          user: req.get('X-Remote-User'),
        },
        'Challenge received'
      );

      const body: ChallengePayloadResponse = {
        apiVersion: parsed.data.apiVersion ?? CHALLENGE_PAYLOAD_API_VERSION,
        kind: CHALLENGE_PAYLOAD_KIND,
        response: await handleChallenge(solver, request, logger),
      };
      res.json(body);
    } catch (err) {
      next(err);
    }
  });

  app.use((req, res) => {
    res.status(404).json({ error: `${req.method} ${req.path} not found` });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err, method: req.method, path: req.path }, 'Request failed');
    if (res.headersSent) return;

    // JSON parse error from express.json()
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Invalid JSON in request body' });
      return;
    }

    // Use explicit status if set on the error object
    const status = httpStatus(err);
    if (status !== undefined) {
      res.status(status).json({ error: errorMessage(err) });
      return;
    }

    res.status(500).json({ error: errorMessage(err) || 'Internal server error' });
  });

  return app;
}

function tlsOptions(settings: Settings): https.ServerOptions | undefined {
  if (!settings.tlsCertFile || !settings.tlsKeyFile) return undefined;

  const options: https.ServerOptions = {
    cert: readFileSync(settings.tlsCertFile),
    key: readFileSync(settings.tlsKeyFile),
  };
  if (settings.requestheaderClientCaFile) {
    // Handshakes without a certificate still complete so that kubelet health checks reach /healthz
    options.ca = readFileSync(settings.requestheaderClientCaFile);
    options.requestCert = true;
    options.rejectUnauthorized = false;
  }
  return options;
}

/**
 * Listen with the process settings; HTTPS when a certificate is configured,
 * and `/apis` restricted to callers holding a certificate from
 * `REQUESTHEADER_CLIENT_CA_FILE` when that is set.
 */
export function startServer(settings: Settings, solvers: Solver[], logger: Logger): Promise<http.Server> {
  const clientAuth = settings.requestheaderClientCaFile
    ? { allowedNames: settings.requestheaderAllowedNames }
    : undefined;
  const app = createApp({ groupName: settings.groupName, solvers, logger, clientAuth });

  const tls = tlsOptions(settings);
  const server: http.Server = tls ? https.createServer(tls, app) : http.createServer(app);

  if (!clientAuth) {
    logger.warn('Client authentication disabled: any caller can reach the solvers');
  }

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(settings.port, () => {
      server.off('error', reject);
      logger.info(
        { port: settings.port, group: settings.groupName, tls: server instanceof https.Server },
        'Webhook server listening'
      );
      resolve(server);
    });
  });
}
