import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DirectApiChannel, readMediaId } from '../../channels/directApiChannel';
import type { ApiRequest, ApiResponse } from '../../middleware/lightFetcher';

const SETTINGS = {
  graphApiUrl: 'https://graph.example.test/v21.0',
  phoneNumberId: '555000',
  accessToken: 'test-secret',
};

const MEDIA_URL = 'https://graph.example.test/v21.0/555000/media';
const MESSAGES_URL = 'https://graph.example.test/v21.0/555000/messages';

/** Answers requests from a queue and records every request. */
function fakeTransport(responses: Array<ApiResponse | Error>) {
  const requests: ApiRequest[] = [];
  const transport = async (request: ApiRequest): Promise<ApiResponse> => {
    requests.push(request);
    const next = responses.shift();
    if (!next) throw new Error('unexpected request');
    if (next instanceof Error) throw next;
    return next;
  };
  return { transport, requests };
}

describe('DirectApiChannel', () => {
  let dir: string;
  let imagePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'courier-api-'));
    imagePath = join(dir, 'screenshot.png');
    await writeFile(imagePath, Buffer.from([0x89, 0x50, 0x4e, 0x47]));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uploads the image once and sends an image message per recipient', async () => {
    const { transport, requests } = fakeTransport([
      { statusCode: 200, body: '{"id":"media-1"}' },
      { statusCode: 200, body: '{"messages":[{"id":"wamid.1"}]}' },
      { statusCode: 200, body: '{"messages":[{"id":"wamid.2"}]}' },
    ]);
    const channel = new DirectApiChannel(SETTINGS, transport);

    await channel.open();
    const first = await channel.send('919900000001', imagePath, 'Cause List\n20-10-2026');
    const second = await channel.send('919900000002', imagePath, 'Cause List\n20-10-2026');
    await channel.close();

    expect(first).toEqual({ ok: true });
    expect(second).toEqual({ ok: true });
    expect(requests.map((r) => r.url)).toEqual([MEDIA_URL, MESSAGES_URL, MESSAGES_URL]);

    const upload = requests[0];
    expect(upload.headers).toEqual({ authorization: 'Bearer test-secret' });
    if (!('form' in upload)) throw new Error('expected a multipart upload');
    expect(upload.form.get('messaging_product')).toBe('whatsapp');
    expect(upload.form.get('file')).toBeInstanceOf(Blob);

    const message = requests[2];
    if (!('json' in message)) throw new Error('expected a JSON message');
    expect(message.json).toEqual({
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to: '919900000002',
      type: 'image',
      image: { id: 'media-1', caption: 'Cause List\n20-10-2026' },
    });
  });

  it('reports an upload rejection and retries the upload for the next recipient', async () => {
    const { transport, requests } = fakeTransport([
      { statusCode: 400, body: '{"error":{"message":"Invalid parameter"}}' },
      { statusCode: 200, body: '{"id":"media-2"}' },
      { statusCode: 200, body: '{}' },
    ]);
    const channel = new DirectApiChannel(SETTINGS, transport);

    await channel.open();
    const first = await channel.send('111', imagePath, '');
    const second = await channel.send('222', imagePath, '');

    expect(first).toEqual({
      ok: false,
      reason: 'http 400: {"error":{"message":"Invalid parameter"}}',
    });
    expect(second).toEqual({ ok: true });
    expect(requests.map((r) => r.url)).toEqual([MEDIA_URL, MEDIA_URL, MESSAGES_URL]);
  });

  it('fails a recipient whose message is rejected', async () => {
    const { transport } = fakeTransport([
      { statusCode: 200, body: '{"id":"media-1"}' },
      { statusCode: 500, body: 'upstream error' },
    ]);
    const channel = new DirectApiChannel(SETTINGS, transport);

    await channel.open();

    expect(await channel.send('111', imagePath, 'x')).toEqual({
      ok: false,
      reason: 'http 500: upstream error',
    });
  });

  it('fails when the upload answer has no media id', async () => {
    const { transport } = fakeTransport([{ statusCode: 200, body: '{"ok":true}' }]);
    const channel = new DirectApiChannel(SETTINGS, transport);

    await channel.open();

    expect(await channel.send('111', imagePath, 'x')).toEqual({
      ok: false,
      reason: 'media upload response carried no id: {"ok":true}',
    });
  });

  it('turns transport errors into failed outcomes', async () => {
    const { transport } = fakeTransport([new Error('socket hang up')]);
    const channel = new DirectApiChannel(SETTINGS, transport);

    await channel.open();

    expect(await channel.send('111', imagePath, 'x')).toEqual({ ok: false, reason: 'socket hang up' });
  });

  it('fails when the image file is missing', async () => {
    const { transport, requests } = fakeTransport([]);
    const channel = new DirectApiChannel(SETTINGS, transport);

    await channel.open();
    const outcome = await channel.send('111', join(dir, 'missing.png'), 'x');

    expect(outcome.ok).toBe(false);
    expect(requests).toHaveLength(0);
  });

  it('reads the media id from an upload answer', () => {
    expect(readMediaId('{"id":"abc"}')).toBe('abc');
    expect(readMediaId('{"id":42}')).toBeNull();
    expect(readMediaId('not json')).toBeNull();
  });
});
