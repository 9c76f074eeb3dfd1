import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as http from 'node:http';
import * as path from 'node:path';
import { GoogleCredentials, type OAuthClient } from '../google-auth.js';
import { AuthError, PreconditionError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { makeTempDir, removeDir } from '../../__tests__/helpers.js';

const client: OAuthClient = {
  client_id:     'test-client',
  client_secret: 'test-secret',
  auth_uri:      'https://accounts.example.test/o/oauth2/auth',
  token_uri:     'https://oauth2.example.test/token',
};

const SCOPES = [
  'https://www.googleapis.com/auth/youtube.upload',
  'https://www.googleapis.com/auth/youtube',
];

describe('GoogleCredentials', () => {
  let dir: string;
  let tokenPath: string;
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    dir = makeTempDir();
    tokenPath = path.join(dir, 'token.json');
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    removeDir(dir);
  });

  describe('fromFiles', () => {
    it('requires the client secrets file', () => {
      expect(() => GoogleCredentials.fromFiles(path.join(dir, 'nope.json'), tokenPath)).toThrow(PreconditionError);
    });

    it('rejects secrets without an installed or web client', () => {
      const secretsPath = path.join(dir, 'client_secrets.json');
      fs.writeFileSync(secretsPath, JSON.stringify({ other: {} }));

      expect(() => GoogleCredentials.fromFiles(secretsPath, tokenPath)).toThrow(AuthError);
    });

    it('reuses a cached token that has not expired', async () => {
      const secretsPath = path.join(dir, 'client_secrets.json');
      fs.writeFileSync(secretsPath, JSON.stringify({
        web: { client_id: 'test-client', client_secret: 'test-secret' },
      }));
      fs.writeFileSync(tokenPath, JSON.stringify({ token: 'cached-token', expiry: '2999-01-01T00:00:00Z' }));

      const credentials = GoogleCredentials.fromFiles(secretsPath, tokenPath);

      expect(await credentials.getAccessToken()).toBe('cached-token');
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  it('trusts a token with no recorded expiry', async () => {
    const credentials = new GoogleCredentials(client, tokenPath, { token: 'no-expiry' });
    expect(await credentials.getAccessToken()).toBe('no-expiry');
  });

  it('refreshes a token inside the expiry margin and saves the result', async () => {
    const now = Date.parse('2024-01-01T00:00:30.000Z');
    const credentials = new GoogleCredentials(
      client,
      tokenPath,
      { token: 'old-token', refresh_token: 'test-refresh', expiry: '2024-01-01T00:01:00.000Z' },
      () => now,
    );
    fetchMock.mockResolvedValueOnce(Response.json({ access_token: 'new-token', expires_in: 3600 }));

    expect(await credentials.getAccessToken()).toBe('new-token');

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://oauth2.example.test/token');
    expect(String(init?.body)).toBe(
      'client_id=test-client&client_secret=test-secret&grant_type=refresh_token&refresh_token=test-refresh',
    );
    expect(JSON.parse(fs.readFileSync(tokenPath, 'utf-8'))).toEqual({
      token:         'new-token',
      refresh_token: 'test-refresh',
      token_uri:     'https://oauth2.example.test/token',
      client_id:     'test-client',
      client_secret: 'test-secret',
      scopes:        SCOPES,
      expiry:        '2024-01-01T01:00:30.000Z',
    });
  });

  it('fails with the token endpoint response when a refresh is rejected', async () => {
    const credentials = new GoogleCredentials(client, tokenPath, { refresh_token: 'test-refresh' });
    fetchMock.mockResolvedValueOnce(new Response('invalid_grant', { status: 400 }));

    await expect(credentials.getAccessToken()).rejects.toThrow(
      'Token request (refresh_token) failed: HTTP 400 — invalid_grant',
    );
  });

  it('runs the loopback consent flow when no token is stored', async () => {
    let redirectUri = '';
    vi.spyOn(logger, 'info').mockImplementation((_msg, meta) => {
      const url = meta?.['url'];
      if (typeof url !== 'string') return;
      const consent = new URL(url);
      redirectUri = consent.searchParams.get('redirect_uri') ?? '';
      const state = consent.searchParams.get('state') ?? '';
      http
        .get(`${redirectUri}?code=test-code&state=${state}`, (res) => res.resume())
        .on('error', (err) => {
          throw err;
        });
    });
    fetchMock.mockResolvedValueOnce(
      Response.json({ access_token: 'granted-token', refresh_token: 'test-refresh', expires_in: 3600 }),
    );

    const credentials = new GoogleCredentials(client, tokenPath, null, () => 0);

    expect(await credentials.getAccessToken()).toBe('granted-token');
    expect(redirectUri).toMatch(/^http:\/\/127\.0\.0\.1:\d+\/$/);

    const [, init] = fetchMock.mock.calls[0] ?? [];
    const body = new URLSearchParams(String(init?.body));
    expect(body.get('grant_type')).toBe('authorization_code');
    expect(body.get('code')).toBe('test-code');
    expect(body.get('redirect_uri')).toBe(redirectUri);

    expect(JSON.parse(fs.readFileSync(tokenPath, 'utf-8'))).toMatchObject({
      token:         'granted-token',
      refresh_token: 'test-refresh',
      expiry:        '1970-01-01T01:00:00.000Z',
    });
  });
});
