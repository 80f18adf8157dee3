import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Agent } from 'undici';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TLSError } from '../error/tlsError.js';
import { FetchTransport } from './client.js';

const mocks = vi.hoisted(() => ({
  fetch: vi.fn(),
  close: vi.fn(async () => {}),
}));

vi.mock('undici', () => ({
  fetch: mocks.fetch,
  Agent: vi.fn(function (this: { close: () => Promise<void> }) {
    this.close = mocks.close;
  }),
}));

const okResponse = {
  status: 200,
  ok: true,
  headers: { get: () => 'text/xml' },
  arrayBuffer: async () => new ArrayBuffer(0),
};

describe('FetchTransport', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'qizx-transport-'));
    mocks.fetch.mockReset();
    mocks.close.mockClear();
    vi.mocked(Agent).mockClear();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('requests', () => {
    it('sends GET requests with plain headers and the signal', async () => {
      mocks.fetch.mockResolvedValueOnce(okResponse);
      const controller = new AbortController();
      const transport = new FetchTransport();

      const [err, response] = await transport.get('http://db.local/api?op=info', {
        headers: new Headers({ Authorization: 'Basic YWRhOg==' }),
        signal: controller.signal,
      });

      expect(err).toBeNull();
      expect(response).toBe(okResponse);
      expect(mocks.fetch).toHaveBeenCalledWith('http://db.local/api?op=info', {
        method: 'GET',
        headers: { authorization: 'Basic YWRhOg==' },
        body: undefined,
        signal: controller.signal,
      });
    });

    it('sends POST bodies as-is', async () => {
      mocks.fetch.mockResolvedValueOnce(okResponse);
      const transport = new FetchTransport();

      await transport.post('http://db.local/api', {
        headers: new Headers({ 'Content-Type': 'application/x-www-form-urlencoded; charset=utf-8' }),
        body: 'op=eval&query=1',
      });

      expect(mocks.fetch).toHaveBeenCalledWith('http://db.local/api', {
        method: 'POST',
        headers: { 'content-type': 'application/x-www-form-urlencoded; charset=utf-8' },
        body: 'op=eval&query=1',
      });
    });

    it('returns non-2xx responses without turning them into errors', async () => {
      const notFound = { ...okResponse, status: 404, ok: false };
      mocks.fetch.mockResolvedValueOnce(notFound);

      const [err, response] = await new FetchTransport().get('http://db.local/api', { headers: new Headers() });

      expect(err).toBeNull();
      expect(response?.status).toBe(404);
    });

    it('wraps fetch failures with the original error as cause', async () => {
      const failure = new TypeError('fetch failed');
      mocks.fetch.mockRejectedValueOnce(failure);

      const [err, response] = await new FetchTransport().post('http://db.local/api', { headers: new Headers() });

      expect(response).toBeNull();
      expect(err?.message).toBe('error sending POST request in fetchTransport');
      expect(err?.cause).toBe(failure);
    });
  });

  describe('tls', () => {
    it('uses the default dispatcher when verification is enabled', async () => {
      mocks.fetch.mockResolvedValueOnce(okResponse);
      const transport = new FetchTransport({ tls: { verify: { kind: 'enabled' } } });

      await transport.get('https://db.local/api', { headers: new Headers() });

      expect(Agent).not.toHaveBeenCalled();
      expect(mocks.fetch.mock.calls[0][1]).not.toHaveProperty('dispatcher');
    });

    it('builds one agent with verification disabled', async () => {
      mocks.fetch.mockResolvedValue(okResponse);
      const transport = new FetchTransport({ tls: { verify: { kind: 'disabled' } } });

      await transport.get('https://db.local/api', { headers: new Headers() });
      await transport.get('https://db.local/api', { headers: new Headers() });

      expect(Agent).toHaveBeenCalledTimes(1);
      expect(Agent).toHaveBeenCalledWith({ connect: { rejectUnauthorized: false } });
      expect(mocks.fetch.mock.calls[1][1]).toHaveProperty('dispatcher');
    });

    it('loads the CA bundle and client certificate', async () => {
      mocks.fetch.mockResolvedValueOnce(okResponse);
      const ca = join(dir, 'ca.pem');
      const cert = join(dir, 'client.pem');
      await writeFile(ca, 'ca-placeholder');
      await writeFile(cert, 'cert-placeholder');
      const transport = new FetchTransport({ tls: { verify: { kind: 'bundle', path: ca }, clientCert: cert } });

      const [err] = await transport.get('https://db.local/api', { headers: new Headers() });

      expect(err).toBeNull();
      expect(Agent).toHaveBeenCalledWith({
        connect: {
          rejectUnauthorized: true,
          ca: Buffer.from('ca-placeholder'),
          cert: Buffer.from('cert-placeholder'),
          key: Buffer.from('cert-placeholder'),
        },
      });
    });

    it('returns TLSError for unreadable TLS files without sending', async () => {
      const missing = join(dir, 'missing.pem');
      const transport = new FetchTransport({ tls: { verify: { kind: 'bundle', path: missing } } });

      const [err, response] = await transport.get('https://db.local/api', { headers: new Headers() });

      expect(response).toBeNull();
      expect(err).toBeInstanceOf(TLSError);
      expect(err?.message).toBe(`error reading CA bundle ${missing}`);
      expect(mocks.fetch).not.toHaveBeenCalled();
    });

    it('closes the agent on dispose', async () => {
      mocks.fetch.mockResolvedValueOnce(okResponse);
      const transport = new FetchTransport({ tls: { verify: { kind: 'disabled' } } });
      await transport.get('https://db.local/api', { headers: new Headers() });

      await transport.dispose();
      await transport.dispose();

      expect(mocks.close).toHaveBeenCalledTimes(1);
    });
  });
});
