/**
 * OCI registry client.
 *
 * Answers one question: does `registry/repository:tag` have a manifest?
 * Uses the distribution API (HEAD /v2/<name>/manifests/<tag>) with the
 * anonymous or basic-auth bearer token dance registries such as GHCR expect.
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { getLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import { RegistryUnreachableError } from '../promotion/errors.js';
import { formatImageReference } from '../promotion/ImageReferenceResolver.js';
import type { ImageReference } from '../promotion/types.js';
import type { ImageRegistry } from './types.js';

export interface RegistryClientOptions {
  timeoutMs: number;
  username?: string;
  token?: string;
  /** Defaults to https; tests and local registries may use http */
  scheme?: 'https' | 'http';
}

export const MANIFEST_ACCEPT = [
  'application/vnd.oci.image.index.v1+json',
  'application/vnd.oci.image.manifest.v1+json',
  'application/vnd.docker.distribution.manifest.list.v2+json',
  'application/vnd.docker.distribution.manifest.v2+json',
].join(', ');

export interface BearerChallenge {
  realm: string;
  service?: string;
  scope?: string;
}

/**
 * Parse `Bearer realm="...",service="...",scope="..."`.
 */
export function parseBearerChallenge(header: string | undefined): BearerChallenge | null {
  if (!header || !/^bearer\s/i.test(header)) {
    return null;
  }
  const params: Record<string, string> = {};
  for (const match of header.slice(header.indexOf(' ') + 1).matchAll(/(\w+)="([^"]*)"/g)) {
    const [, key, value] = match;
    if (key && value !== undefined) params[key.toLowerCase()] = value;
  }
  const realm = params['realm'];
  if (!realm) return null;
  return {
    realm,
    ...(params['service'] ? { service: params['service'] } : {}),
    ...(params['scope'] ? { scope: params['scope'] } : {}),
  };
}

export class RegistryClient implements ImageRegistry {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  /** registry host + repository -> bearer token */
  private readonly tokens = new Map<string, string>();

  constructor(private readonly options: RegistryClientOptions) {
    this.logger = getLogger('registry-client');
    this.http = axios.create({
      timeout: options.timeoutMs,
      validateStatus: () => true,
    });
  }

  async exists(ref: ImageReference): Promise<boolean> {
    const display = formatImageReference(ref);
    const scheme = this.options.scheme ?? 'https';
    const url = `${scheme}://${ref.registry}/v2/${ref.repository}/manifests/${ref.tag}`;
    const cacheKey = `${ref.registry}/${ref.repository}`;

    let response = await this.head(url, display, this.tokens.get(cacheKey));

    if (response.status === 401) {
      const challenge = parseBearerChallenge(headerValue(response.headers, 'www-authenticate'));
      if (!challenge) {
        throw new RegistryUnreachableError(display, 'authentication required and no bearer challenge offered');
      }
      const token = await this.fetchToken(challenge, display);
      this.tokens.set(cacheKey, token);
      response = await this.head(url, display, token);
    }

    this.logger.debug(`HEAD ${url} -> ${response.status}`);

    switch (response.status) {
      case 200:
        return true;
      case 404:
        return false;
      case 401:
      case 403:
        throw new RegistryUnreachableError(display, `access denied (${response.status})`);
      default:
        throw new RegistryUnreachableError(display, `unexpected status ${response.status}`);
    }
  }

  private async head(
    url: string,
    display: string,
    token: string | undefined
  ): Promise<{ status: number; headers: Record<string, unknown> }> {
    const headers: Record<string, string> = { Accept: MANIFEST_ACCEPT };
    if (token) headers['Authorization'] = `Bearer ${token}`;
    try {
      const response = await this.http.head(url, { headers });
      return { status: response.status, headers: { ...response.headers } };
    } catch (err) {
      throw new RegistryUnreachableError(display, err instanceof Error ? err.message : String(err));
    }
  }

  private async fetchToken(challenge: BearerChallenge, display: string): Promise<string> {
    const params: Record<string, string> = {};
    if (challenge.service) params['service'] = challenge.service;
    if (challenge.scope) params['scope'] = challenge.scope;

    const auth =
      this.options.username && this.options.token
        ? { username: this.options.username, password: this.options.token }
        : undefined;

    let response: { status: number; data: unknown };
    try {
      response = await this.http.get(challenge.realm, { params, ...(auth ? { auth } : {}) });
    } catch (err) {
      throw new RegistryUnreachableError(display, err instanceof Error ? err.message : String(err));
    }
    if (response.status !== 200) {
      throw new RegistryUnreachableError(display, `token request failed (${response.status})`);
    }
    const token = extractToken(response.data);
    if (!token) {
      throw new RegistryUnreachableError(display, 'token response did not contain a token');
    }
    return token;
  }
}

function headerValue(headers: Record<string, unknown>, name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name && typeof value === 'string') return value;
  }
  return undefined;
}

function extractToken(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null) return undefined;
  if ('token' in data && typeof data.token === 'string') return data.token;
  if ('access_token' in data && typeof data.access_token === 'string') return data.access_token;
  return undefined;
}
