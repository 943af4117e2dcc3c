/**
 * directApiChannel.ts — Delivery through the WhatsApp Business Cloud API.
 *
 * Stateless apart from one cached media handle per pass:
 *
 *   1. POST {graph}/{phoneNumberId}/media     multipart: file + messaging_product
 *      → { id }
 *   2. POST {graph}/{phoneNumberId}/messages  JSON image message referencing id
 *
 * The upload happens on the first recipient and the returned id is reused for
 * the rest.  When the upload fails, the next recipient tries again.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import type { DirectApiSettings } from '../core/config';
import type { DeliveryOutcome, Recipient } from '../core/types';
import { Logger } from '../core/logger';
import { apiRequest, type ApiResponse, type ApiTransport } from '../middleware/lightFetcher';
import { describeError, type DeliveryChannel } from './deliveryChannel';

const BODY_EXCERPT_LENGTH = 300;

type Step<T> = { ok: true; value: T } | { ok: false; reason: string };

export class DirectApiChannel implements DeliveryChannel {
  readonly name = 'api';
  private readonly logger = new Logger('DirectApiChannel');

  /** imagePath → uploaded media id, valid for the current pass. */
  private readonly mediaIds = new Map<string, string>();

  constructor(
    private readonly settings: DirectApiSettings,
    private readonly transport: ApiTransport = apiRequest,
  ) {}

  async open(): Promise<void> {
    this.mediaIds.clear();
  }

  async close(): Promise<void> {
    this.mediaIds.clear();
  }

  async send(recipient: Recipient, imagePath: string, caption: string): Promise<DeliveryOutcome> {
    try {
      const media = await this.mediaIdFor(imagePath);
      if (!media.ok) {
        this.logger.warn(`Media upload failed for ${recipient}: ${media.reason}`);
        return { ok: false, reason: media.reason };
      }

      const response = await this.transport({
        method: 'POST',
        url: this.endpoint('messages'),
        headers: this.authHeaders(),
        json: {
          messaging_product: 'whatsapp',
          recipient_type: 'individual',
          to: recipient,
          type: 'image',
          image: { id: media.value, caption },
        },
      });

      if (!isSuccess(response)) {
        const reason = httpFailure(response);
        this.logger.warn(`Image message to ${recipient} rejected: ${reason}`);
        return { ok: false, reason };
      }

      this.logger.info(`Image delivered to ${recipient}`);
      return { ok: true };
    } catch (err) {
      const reason = describeError(err);
      this.logger.error(`Image delivery to ${recipient} failed: ${reason}`);
      return { ok: false, reason };
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async mediaIdFor(imagePath: string): Promise<Step<string>> {
    const cached = this.mediaIds.get(imagePath);
    if (cached) return { ok: true, value: cached };

    const bytes = await readFile(imagePath);
    const form = new FormData();
    form.append('messaging_product', 'whatsapp');
    form.append('type', 'image/png');
    form.append('file', new Blob([new Uint8Array(bytes)], { type: 'image/png' }), basename(imagePath));

    const response = await this.transport({
      method: 'POST',
      url: this.endpoint('media'),
      headers: this.authHeaders(),
      form,
    });

    if (!isSuccess(response)) {
      return { ok: false, reason: httpFailure(response) };
    }

    const id = readMediaId(response.body);
    if (!id) {
      return { ok: false, reason: `media upload response carried no id: ${excerpt(response.body)}` };
    }

    this.logger.info(`Uploaded ${basename(imagePath)} as media ${id}`);
    this.mediaIds.set(imagePath, id);
    return { ok: true, value: id };
  }

  private endpoint(resource: 'media' | 'messages'): string {
    return `${this.settings.graphApiUrl}/${this.settings.phoneNumberId}/${resource}`;
  }

  private authHeaders(): Record<string, string> {
    return { authorization: `Bearer ${this.settings.accessToken}` };
  }
}

function isSuccess(response: ApiResponse): boolean {
  return response.statusCode >= 200 && response.statusCode < 300;
}

function httpFailure(response: ApiResponse): string {
  return `http ${response.statusCode}: ${excerpt(response.body)}`;
}

function excerpt(body: string): string {
  return body.length > BODY_EXCERPT_LENGTH ? `${body.slice(0, BODY_EXCERPT_LENGTH)}…` : body;
}

export function readMediaId(body: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('id' in parsed)) return null;
  const id = parsed.id;
  return typeof id === 'string' && id.length > 0 ? id : null;
}
