import type { CredentialConfig } from '@/config/musicService';
import type { EndpointCandidate, StoreCredentialRequest, TokenResponse } from '@/domain/credentials/types';
import type { TimerPort } from '@/ports/TimerPort';
import { safeReadText } from '@/shared/bestEffort';
import {
  ConfigurationError,
  CredentialError,
  ExhaustionError,
  HttpStatusError,
  ProtocolError,
  parseRetryAfter,
} from '@/shared/errors';
import { createLogger, errorMessage, type ScopedLog } from '@/shared/logging/logger';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface CredentialBackendDeps {
  config: CredentialConfig;
  timers: TimerPort;
  fetchImpl?: FetchLike;
  log?: ScopedLog;
}

type AttemptOutcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'fatal'; error: CredentialError }
  | { kind: 'failed'; error: unknown };

interface BackendRequest<T> {
  method: 'GET' | 'POST' | 'DELETE';
  path: string;
  body?: unknown;
  /** What a 404 means for this call. */
  notFound: 'missing-credential' | 'success' | 'failure';
  parse: (response: Response) => Promise<T>;
}

const ROUND_BACKOFF_START_MS = 500;

/**
 * HTTP client for the credential backend. Every call walks the configured base
 * URLs (last healthy one first) with a per-attempt timeout, and repeats the
 * whole walk a bounded number of times before giving up.
 */
export class CredentialBackendClient {
  private readonly endpoints: EndpointCandidate[];
  private sticky: string | null = null;
  private readonly fetchImpl: FetchLike;
  private readonly log: ScopedLog;

  constructor(private readonly deps: CredentialBackendDeps) {
    if (deps.config.endpoints.length === 0) {
      throw new ConfigurationError('no credential backend endpoints configured', 'endpoints');
    }
    this.endpoints = deps.config.endpoints.map((url) => ({ url, lastKnownHealthy: true }));
    this.fetchImpl = deps.fetchImpl ?? ((url, init) => fetch(url, init));
    this.log = deps.log ?? createLogger('Credentials', 'Backend');
  }

  public fetchToken(): Promise<TokenResponse> {
    return this.request({
      method: 'GET',
      path: this.tokenPath(),
      notFound: 'missing-credential',
      parse: async (response) => parseTokenResponse(await readJson(response)),
    });
  }

  public storeToken(credential: StoreCredentialRequest): Promise<void> {
    return this.request({
      method: 'POST',
      path: this.tokenPath(),
      body: credential,
      notFound: 'failure',
      parse: async () => undefined,
    });
  }

  /** Deleting a credential the backend does not have counts as done. */
  public revokeToken(): Promise<void> {
    return this.request({
      method: 'DELETE',
      path: this.tokenPath(),
      notFound: 'success',
      parse: async () => undefined,
    });
  }

  /** Probes every endpoint once; returns the first healthy base URL. */
  public async checkHealth(): Promise<string | null> {
    for (const endpoint of this.ordered()) {
      const outcome = await this.attempt(endpoint, {
        method: 'GET',
        path: '/health',
        notFound: 'failure',
        parse: async () => undefined,
      });
      if (outcome.kind === 'ok') {
        return endpoint.url;
      }
    }
    return null;
  }

  public getEndpoints(): readonly EndpointCandidate[] {
    return this.endpoints.map((endpoint) => ({ ...endpoint }));
  }

  public getStickyEndpoint(): string | null {
    return this.sticky;
  }

  private tokenPath(): string {
    return `/devices/${encodeURIComponent(this.deps.config.deviceId)}/token`;
  }

  private async request<T>(request: BackendRequest<T>): Promise<T> {
    const rounds = Math.max(1, this.deps.config.maxAttempts);
    let lastError: unknown = null;
    let delayMs = ROUND_BACKOFF_START_MS;

    for (let round = 1; round <= rounds; round += 1) {
      for (const endpoint of this.ordered()) {
        const outcome = await this.attempt(endpoint, request);
        if (outcome.kind === 'ok') {
          return outcome.value;
        }
        if (outcome.kind === 'fatal') {
          throw outcome.error;
        }
        lastError = outcome.error;
      }
      if (round < rounds) {
        this.log.debug('all credential endpoints failed; backing off', { round, delayMs });
        await this.deps.timers.sleep(delayMs);
        delayMs *= 2;
      }
    }

    this.log.warn('credential backend exhausted', {
      method: request.method,
      path: request.path,
      rounds,
      message: errorMessage(lastError),
    });
    throw new ExhaustionError('Could not reach the credential service', rounds, undefined, {
      cause: lastError,
    });
  }

  private async attempt<T>(endpoint: EndpointCandidate, request: BackendRequest<T>): Promise<AttemptOutcome<T>> {
    const url = `${endpoint.url}${request.path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.deps.config.requestTimeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        method: request.method,
        headers: {
          Accept: 'application/json',
          ...(request.body === undefined ? {} : { 'Content-Type': 'application/json' }),
        },
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (response.status === 404 && request.notFound !== 'failure') {
        this.markHealthy(endpoint);
        if (request.notFound === 'missing-credential') {
          return { kind: 'fatal', error: new CredentialError('No credential stored for this device', 'missing') };
        }
        return { kind: 'ok', value: await request.parse(response) };
      }

      if (!response.ok) {
        const body = await safeReadText(response, '', {
          onError: 'debug',
          log: this.log,
          label: 'credential backend error body read failed',
          context: { status: response.status },
        });
        throw new HttpStatusError(
          response.status,
          url,
          parseRetryAfter(response.headers.get('retry-after'), Date.now()),
          body.slice(0, 200),
        );
      }

      const value = await request.parse(response);
      this.markHealthy(endpoint);
      return { kind: 'ok', value };
    } catch (error) {
      this.markUnhealthy(endpoint, error);
      return { kind: 'failed', error };
    } finally {
      clearTimeout(timeout);
    }
  }

  private ordered(): EndpointCandidate[] {
    const sticky = this.endpoints.filter((endpoint) => endpoint.url === this.sticky);
    const rest = this.endpoints.filter((endpoint) => endpoint.url !== this.sticky);
    return [
      ...sticky,
      ...rest.filter((endpoint) => endpoint.lastKnownHealthy),
      ...rest.filter((endpoint) => !endpoint.lastKnownHealthy),
    ];
  }

  private markHealthy(endpoint: EndpointCandidate): void {
    endpoint.lastKnownHealthy = true;
    if (this.sticky !== endpoint.url) {
      this.log.info('credential endpoint selected', { url: endpoint.url });
      this.sticky = endpoint.url;
    }
  }

  private markUnhealthy(endpoint: EndpointCandidate, error: unknown): void {
    endpoint.lastKnownHealthy = false;
    if (this.sticky === endpoint.url) {
      this.sticky = null;
    }
    this.log.warn('credential endpoint failed', { url: endpoint.url, message: errorMessage(error) });
  }
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new ProtocolError('credential response is not JSON', text.slice(0, 200));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseTokenResponse(raw: unknown): TokenResponse {
  if (!isRecord(raw)) {
    throw new ProtocolError('credential response is not an object');
  }
  const { accessToken, refreshToken, expiresIn, expiresAt } = raw;
  if (typeof accessToken !== 'string' || accessToken.trim().length === 0) {
    throw new ProtocolError('credential response missing accessToken');
  }
  if (typeof expiresIn !== 'number' || !Number.isFinite(expiresIn) || expiresIn <= 0) {
    throw new ProtocolError('credential response has an invalid expiresIn');
  }
  return {
    accessToken,
    refreshToken: typeof refreshToken === 'string' && refreshToken.length > 0 ? refreshToken : undefined,
    expiresIn,
    expiresAt: typeof expiresAt === 'string' ? expiresAt : '',
  };
}
