import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { RemoteClient, normalizeServerUrl, parseBulkCheckResponse } from '../client/remote-client.js';
import { DEFAULT_SUPPORTED_TYPES } from '../client/media-types.js';
import type { UploadMetadata } from '../client/types.js';
import { FileReadError, ServerRejection, TransportError } from '../errors.js';
import { testLogger, writeFile } from './helpers.js';

interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: RequestInit['body'];
}

/** In-process fetch: records each request and answers with `respond` */
function fakeFetch(respond: (url: string, init: RequestInit) => Response | Promise<Response>): {
  fetch: typeof fetch;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const impl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const options = init ?? {};
    requests.push({
      url,
      method: options.method ?? 'GET',
      headers: new Headers(options.headers),
      body: options.body,
    });
    return respond(url, options);
  };
  return { fetch: impl, requests };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function makeClient(fetchImpl: typeof fetch, serverUrl = 'http://media.test:2283'): RemoteClient {
  return new RemoteClient({ serverUrl, apiKey: 'test-secret', fetch: fetchImpl }, testLogger());
}

describe('normalizeServerUrl', () => {
  it('should strip trailing slashes and a trailing /api', () => {
    expect(normalizeServerUrl('http://media.test:2283/')).toBe('http://media.test:2283');
    expect(normalizeServerUrl('http://media.test:2283/api')).toBe('http://media.test:2283');
    expect(normalizeServerUrl('http://media.test:2283/api/')).toBe('http://media.test:2283');
    expect(normalizeServerUrl(' https://photos.example.org/media ')).toBe('https://photos.example.org/media');
  });
});

describe('parseBulkCheckResponse', () => {
  it('should map accept and reject results', () => {
    const body = JSON.stringify({
      results: [
        { id: '/photos/a.jpg', action: 'accept' },
        { id: '/photos/b.jpg', action: 'reject', reason: 'duplicate', assetId: 'asset-7', isTrashed: true },
      ],
    });

    expect(parseBulkCheckResponse(body)).toEqual([
      { action: 'accept', remoteAssetId: undefined, localId: '/photos/a.jpg', alreadyTrashedRemotely: false, reason: '' },
      {
        action: 'reject',
        remoteAssetId: 'asset-7',
        localId: '/photos/b.jpg',
        alreadyTrashedRemotely: true,
        reason: 'duplicate',
      },
    ]);
  });

  it('should treat unknown actions as reject', () => {
    const decisions = parseBulkCheckResponse(JSON.stringify({ results: [{ id: 'x', action: 'maybe' }] }));
    expect(decisions.map((d) => d.action)).toEqual(['reject']);
  });

  it('should return no decisions for a garbled body', () => {
    expect(parseBulkCheckResponse('{"results": [')).toEqual([]);
    expect(parseBulkCheckResponse('null')).toEqual([]);
    expect(parseBulkCheckResponse('{"results": "nope"}')).toEqual([]);
    expect(parseBulkCheckResponse('{"results": [{"action": "accept"}]}')).toEqual([]);
  });
});

describe('RemoteClient', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-sync-client-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should build endpoints under /api', () => {
    const client = makeClient(fakeFetch(() => jsonResponse({})).fetch, 'http://media.test:2283/api/');
    expect(client.endpoint('server/ping')).toBe('http://media.test:2283/api/server/ping');
    expect(client.endpoint('/assets')).toBe('http://media.test:2283/api/assets');
  });

  describe('ping', () => {
    it('should succeed on an exact pong body and send the API key', async () => {
      const { fetch, requests } = fakeFetch(() => new Response('{"res":"pong"}'));

      expect(await makeClient(fetch).ping()).toBe(true);
      expect(requests).toHaveLength(1);
      expect(requests[0]?.url).toBe('http://media.test:2283/api/server/ping');
      expect(requests[0]?.method).toBe('GET');
      expect(requests[0]?.headers.get('x-api-key')).toBe('test-secret');
    });

    it('should fail on any other body', async () => {
      const { fetch } = fakeFetch(() => new Response('{"res": "pong"}'));
      expect(await makeClient(fetch).ping()).toBe(false);
    });

    it('should fail on an error status', async () => {
      const { fetch } = fakeFetch(() => new Response('{"res":"pong"}', { status: 503 }));
      expect(await makeClient(fetch).ping()).toBe(false);
    });

    it('should fail instead of throwing on a network error', async () => {
      const { fetch } = fakeFetch(() => {
        throw new TypeError('fetch failed');
      });
      expect(await makeClient(fetch).ping()).toBe(false);
    });
  });

  describe('fetchSupportedTypes', () => {
    it('should normalize the server lists', async () => {
      const { fetch, requests } = fakeFetch(() =>
        jsonResponse({ image: ['.JPG', 'heic'], video: ['.mp4'], sidecar: ['.xmp'] })
      );

      const types = await makeClient(fetch).fetchSupportedTypes();

      expect(requests[0]?.url).toBe('http://media.test:2283/api/server/media-types');
      expect([...types.imageExtensions]).toEqual(['.jpg', '.heic']);
      expect([...types.videoExtensions]).toEqual(['.mp4']);
      expect([...types.sidecarExtensions]).toEqual(['.xmp']);
    });

    it('should fall back to the built-in types on failure', async () => {
      const { fetch } = fakeFetch(() => new Response('oops', { status: 500 }));
      expect(await makeClient(fetch).fetchSupportedTypes()).toBe(DEFAULT_SUPPORTED_TYPES);
    });

    it('should fall back to the built-in types on an empty image list', async () => {
      const { fetch } = fakeFetch(() => jsonResponse({ image: [], video: ['.mp4'] }));
      expect(await makeClient(fetch).fetchSupportedTypes()).toBe(DEFAULT_SUPPORTED_TYPES);
    });
  });

  describe('reconcile', () => {
    it('should post every checksum in one request', async () => {
      const { fetch, requests } = fakeFetch(() =>
        jsonResponse({ results: [{ id: '/p/a.jpg', action: 'accept' }] })
      );

      const decisions = await makeClient(fetch).reconcile([
        { checksum: 'qUqP5cyxm6YcTAhz05Hph5gvu9M=', localId: '/p/a.jpg' },
        { checksum: 'L9ThxnotKPzthJ7hu3bnORuT6xI=', localId: '/p/b.jpg' },
      ]);

      expect(requests).toHaveLength(1);
      expect(requests[0]?.url).toBe('http://media.test:2283/api/assets/bulk-upload-check');
      expect(requests[0]?.method).toBe('POST');
      expect(requests[0]?.headers.get('content-type')).toBe('application/json');
      expect(requests[0]?.body).toBe(
        JSON.stringify({
          assets: [
            { checksum: 'qUqP5cyxm6YcTAhz05Hph5gvu9M=', id: '/p/a.jpg' },
            { checksum: 'L9ThxnotKPzthJ7hu3bnORuT6xI=', id: '/p/b.jpg' },
          ],
        })
      );
      expect(decisions.map((d) => [d.localId, d.action])).toEqual([['/p/a.jpg', 'accept']]);
    });

    it('should return no decisions for a garbled response', async () => {
      const { fetch } = fakeFetch(() => new Response('<html>proxy error</html>', { status: 200 }));
      const decisions = await makeClient(fetch).reconcile([{ checksum: 'c', localId: '/p/a.jpg' }]);
      expect(decisions).toEqual([]);
    });

    it('should raise TransportError on a 5xx response', async () => {
      const { fetch } = fakeFetch(() => new Response('', { status: 502 }));
      const error = await makeClient(fetch)
        .reconcile([{ checksum: 'c', localId: '/p/a.jpg' }])
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ status: 502, message: 'HTTP 502' });
    });

    it('should raise TransportError when the request cannot be sent', async () => {
      const { fetch } = fakeFetch(() => {
        throw new TypeError('fetch failed');
      });

      await expect(makeClient(fetch).reconcile([{ checksum: 'c', localId: '/p/a.jpg' }])).rejects.toThrow(
        'POST http://media.test:2283/api/assets/bulk-upload-check failed: fetch failed'
      );
    });
  });

  describe('upload', () => {
    const metadata: UploadMetadata = {
      deviceAssetId: 'IMG_0001',
      deviceOwnerTag: 'CanonEOS R5',
      contentCreatedAt: new Date('2024-05-01T10:00:00.000Z'),
      contentModifiedAt: new Date('2024-05-02T08:30:00.000Z'),
    };

    it('should send the file and its descriptive fields as multipart', async () => {
      const photo = writeFile(tmpDir, 'IMG_0001.JPG', 'jpeg-bytes');
      const { fetch, requests } = fakeFetch(() => jsonResponse({ id: 'asset-1', status: 'created' }, 201));

      const body = await makeClient(fetch).upload(photo, metadata);

      expect(body).toBe('{"id":"asset-1","status":"created"}');
      expect(requests[0]?.url).toBe('http://media.test:2283/api/assets');
      expect(requests[0]?.method).toBe('POST');
      expect(requests[0]?.headers.get('x-api-key')).toBe('test-secret');
      expect(requests[0]?.headers.get('content-type')).toBeNull();

      const form = requests[0]?.body;
      expect(form).toBeInstanceOf(FormData);
      if (!(form instanceof FormData)) return;

      expect(form.get('deviceAssetId')).toBe('IMG_0001');
      expect(form.get('deviceId')).toBe('CanonEOS R5');
      expect(form.get('fileCreatedAt')).toBe('2024-05-01T10:00:00.000Z');
      expect(form.get('fileModifiedAt')).toBe('2024-05-02T08:30:00.000Z');

      const asset = form.get('assetData');
      expect(asset).toBeInstanceOf(Blob);
      if (!(asset instanceof Blob)) return;
      expect(await asset.text()).toBe('jpeg-bytes');
    });

    it('should raise FileReadError for a missing file without sending anything', async () => {
      const { fetch, requests } = fakeFetch(() => jsonResponse({}));

      await expect(makeClient(fetch).upload(path.join(tmpDir, 'gone.jpg'), metadata)).rejects.toBeInstanceOf(
        FileReadError
      );
      expect(requests).toHaveLength(0);
    });

    it('should raise FileReadError for a directory', async () => {
      const { fetch, requests } = fakeFetch(() => jsonResponse({}));

      await expect(makeClient(fetch).upload(tmpDir, metadata)).rejects.toBeInstanceOf(FileReadError);
      expect(requests).toHaveLength(0);
    });

    it('should send a body the size of the file on disk', async () => {
      const content = Buffer.alloc(256 * 1024, 3);
      const video = writeFile(tmpDir, 'clip.mp4', content);
      const { fetch, requests } = fakeFetch(() => jsonResponse({ id: 'asset-1', status: 'created' }, 201));

      await makeClient(fetch).upload(video, metadata);

      const form = requests[0]?.body;
      const asset = form instanceof FormData ? form.get('assetData') : null;
      expect(asset).toBeInstanceOf(Blob);
      if (!(asset instanceof Blob)) return;
      expect(asset.size).toBe(content.length);
      expect(Buffer.from(await asset.arrayBuffer()).equals(content)).toBe(true);
    });

    it('should raise ServerRejection with the server message on a 4xx response', async () => {
      const photo = writeFile(tmpDir, 'a.jpg', 'jpeg-bytes');
      const { fetch } = fakeFetch(() => jsonResponse({ message: 'Invalid API key', statusCode: 401 }, 401));

      const error = await makeClient(fetch)
        .upload(photo, metadata)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ServerRejection);
      expect(error).toMatchObject({ status: 401, message: 'Invalid API key' });
    });

    it('should join a list of validation messages', async () => {
      const photo = writeFile(tmpDir, 'a.jpg', 'jpeg-bytes');
      const { fetch } = fakeFetch(() => jsonResponse({ message: ['deviceId must be a string', 'bad date'] }, 400));

      await expect(makeClient(fetch).upload(photo, metadata)).rejects.toThrow('deviceId must be a string, bad date');
    });

    it('should raise TransportError on a 5xx response', async () => {
      const photo = writeFile(tmpDir, 'a.jpg', 'jpeg-bytes');
      const { fetch } = fakeFetch(() => new Response('Bad Gateway', { status: 502 }));

      await expect(makeClient(fetch).upload(photo, metadata)).rejects.toBeInstanceOf(TransportError);
    });
  });
});
