/**
 * Google OAuth credentials for the YouTube Data API.
 *
 * Constructed once at startup and handed to the YouTube client. Token
 * lifecycle: reuse the cached access token while it is valid, otherwise
 * refresh it, otherwise run the installed-app loopback flow (the consent URL
 * is logged; the browser redirects back to a short-lived local server).
 * Every newly obtained token is written back to the token file.
 */
import { randomBytes } from 'node:crypto';
import { existsSync, readFileSync } from 'node:fs';
import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { z } from 'zod';
import { YOUTUBE_SCOPES } from '../config.js';
import { AuthError, PreconditionError, errorMessage } from '../utils/errors.js';
import { writeJsonAtomic } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

// ── Schemas ───────────────────────────────────────────────────────────────────

const OAuthClientSchema = z.object({
  client_id:     z.string().min(1),
  client_secret: z.string().min(1),
  auth_uri:      z.string().url().default('https://accounts.google.com/o/oauth2/auth'),
  token_uri:     z.string().url().default('https://oauth2.googleapis.com/token'),
});

const ClientSecretsSchema = z
  .object({ installed: OAuthClientSchema.optional(), web: OAuthClientSchema.optional() })
  .transform((s) => s.installed ?? s.web)
  .pipe(OAuthClientSchema);

// Authorized-user layout, as written by Google's own client libraries
const StoredTokenSchema = z.object({
  token:         z.string().optional(),
  refresh_token: z.string().optional(),
  token_uri:     z.string().optional(),
  client_id:     z.string().optional(),
  client_secret: z.string().optional(),
  scopes:        z.array(z.string()).optional(),
  expiry:        z.string().optional(),
});

const TokenResponseSchema = z.object({
  access_token:  z.string().min(1),
  expires_in:    z.number().optional(),
  refresh_token: z.string().optional(),
});

export type OAuthClient = z.infer<typeof OAuthClientSchema>;
export type StoredToken = z.infer<typeof StoredTokenSchema>;

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

// Treat tokens this close to expiry as already expired
const EXPIRY_SKEW_MS = 60_000;

// ── Credentials ───────────────────────────────────────────────────────────────

export class GoogleCredentials implements AccessTokenProvider {
  constructor(
    private readonly client: OAuthClient,
    private readonly tokenPath: string,
    private token: StoredToken | null,
    private readonly now: () => number = Date.now,
  ) {}

  static fromFiles(clientSecretsPath: string, tokenPath: string): GoogleCredentials {
    if (!existsSync(clientSecretsPath)) {
      throw new PreconditionError(`Missing client secrets file at ${clientSecretsPath}`);
    }
    const secrets = ClientSecretsSchema.safeParse(readJson(clientSecretsPath));
    if (!secrets.success) {
      throw new AuthError(`Client secrets file ${clientSecretsPath} has no usable "installed" or "web" client`);
    }

    let token: StoredToken | null = null;
    if (existsSync(tokenPath)) {
      const parsed = StoredTokenSchema.safeParse(readJson(tokenPath));
      if (parsed.success) {
        token = parsed.data;
      } else {
        logger.warn('Auth: token file unreadable — will re-authorize', { tokenPath });
      }
    }

    return new GoogleCredentials(secrets.data, tokenPath, token);
  }

  async getAccessToken(): Promise<string> {
    if (this.token?.token && this.isFresh(this.token)) return this.token.token;

    if (this.token?.refresh_token) {
      logger.info('Auth: refreshing access token');
      const response = await this.exchange({
        grant_type:    'refresh_token',
        refresh_token: this.token.refresh_token,
      });
      return this.store(response);
    }

    const response = await this.authorizeInteractively();
    return this.store(response);
  }

  private isFresh(token: StoredToken): boolean {
    // No expiry recorded: trust the token until the API says otherwise
    if (!token.expiry) return true;
    const expiresAt = Date.parse(token.expiry);
    return Number.isFinite(expiresAt) && expiresAt - EXPIRY_SKEW_MS > this.now();
  }

  private store(response: z.infer<typeof TokenResponseSchema>): string {
    const expiry = response.expires_in !== undefined
      ? new Date(this.now() + response.expires_in * 1000).toISOString()
      : undefined;

    this.token = {
      token:         response.access_token,
      refresh_token: response.refresh_token ?? this.token?.refresh_token,
      token_uri:     this.client.token_uri,
      client_id:     this.client.client_id,
      client_secret: this.client.client_secret,
      scopes:        [...YOUTUBE_SCOPES],
      expiry,
    };
    writeJsonAtomic(this.tokenPath, this.token);
    logger.debug('Auth: token saved', { tokenPath: this.tokenPath, expiry });
    return response.access_token;
  }

  private async exchange(params: Record<string, string>): Promise<z.infer<typeof TokenResponseSchema>> {
    let res: Response;
    try {
      res = await fetch(this.client.token_uri, {
        method:  'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body:    new URLSearchParams({
          client_id:     this.client.client_id,
          client_secret: this.client.client_secret,
          ...params,
        }),
      });
    } catch (err) {
      throw new AuthError(`Token endpoint unreachable: ${errorMessage(err)}`, err);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new AuthError(`Token request (${params['grant_type']}) failed: HTTP ${res.status} — ${text}`);
    }

    const parsed = TokenResponseSchema.safeParse(await res.json());
    if (!parsed.success) throw new AuthError('Token endpoint returned an unexpected response');
    return parsed.data;
  }

  // ── Interactive loopback flow ──────────────────────────────────────────────

  private async authorizeInteractively(): Promise<z.infer<typeof TokenResponseSchema>> {
    const server = createServer();
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(0, '127.0.0.1', () => resolve());
    });

    try {
      const { port } = addressOf(server);
      const redirectUri = `http://127.0.0.1:${port}/`;
      const state = randomBytes(16).toString('hex');

      const consentUrl = `${this.client.auth_uri}?${new URLSearchParams({
        client_id:     this.client.client_id,
        redirect_uri:  redirectUri,
        response_type: 'code',
        scope:         YOUTUBE_SCOPES.join(' '),
        access_type:   'offline',
        prompt:        'consent',
        state,
      }).toString()}`;

      logger.info('Auth: open this URL in a browser to authorize YouTube access', { url: consentUrl });

      const code = await waitForAuthCode(server, redirectUri, state);
      return await this.exchange({
        grant_type:   'authorization_code',
        code,
        redirect_uri: redirectUri,
      });
    } finally {
      server.close();
    }
  }
}

// ── Helpers ───────────────────────────────────────────────────────────────────

function readJson(filePath: string): unknown {
  try {
    return JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new AuthError(`${filePath} is not valid JSON`, err);
  }
}

function addressOf(server: Server): AddressInfo {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new AuthError('Loopback server has no TCP address');
  }
  return address;
}

function waitForAuthCode(server: Server, redirectUri: string, expectedState: string): Promise<string> {
  return new Promise((resolve, reject) => {
    server.on('request', (req, res) => {
      const url = new URL(req.url ?? '/', redirectUri);
      const error = url.searchParams.get('error');
      const code = url.searchParams.get('code');
      const state = url.searchParams.get('state');

      if (!error && !code) {
        res.writeHead(404).end();
        return;
      }

      res.writeHead(200, { 'Content-Type': 'text/plain; charset=utf-8' });
      if (error) {
        res.end('Authorization failed. You can close this window.');
        reject(new AuthError(`Authorization denied: ${error}`));
      } else if (state !== expectedState || !code) {
        res.end('Authorization failed (state mismatch). You can close this window.');
        reject(new AuthError('Authorization response state mismatch'));
      } else {
        res.end('Authorization complete. You can close this window.');
        resolve(code);
      }
    });
  });
}
