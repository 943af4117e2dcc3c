/**
 * apiSnapshotProvider.ts — Capture through a hosted screenshot API.
 *
 * For hosts where running Chromium is not an option.  Two requests per poll:
 *
 *   1. the court page itself, over plain HTTP, for date extraction;
 *   2. only when a date was found, the screenshot API
 *      (`GET <api>?url=…&screenshot=true&screenshot.fullPage=true…`), whose
 *      JSON answer points at a rendered PNG that is then downloaded.
 *
 * Skipping step 2 while the list is unpublished keeps the API quota for the
 * evenings that matter.
 */

import type { CaptureResult, QualityProfile } from '../core/types';
import {
  apiRequest,
  fetchBuffer,
  lightFetch,
  type ApiTransport,
  type BinaryFetchResult,
  type LightFetchResult,
} from '../middleware/lightFetcher';
import { writeFileAtomic } from '../services/atomicFile';
import { BaseSnapshotProvider, type SnapshotSettings } from './baseScraper';

export interface ApiSnapshotDeps {
  fetchPage?: (url: string) => Promise<LightFetchResult>;
  transport?: ApiTransport;
  download?: (url: string) => Promise<BinaryFetchResult>;
}

export class ApiSnapshotProvider extends BaseSnapshotProvider {
  readonly name = 'api';

  private readonly fetchPage: (url: string) => Promise<LightFetchResult>;
  private readonly transport: ApiTransport;
  private readonly download: (url: string) => Promise<BinaryFetchResult>;

  constructor(
    settings: SnapshotSettings,
    private readonly screenshotApiUrl: string,
    deps: ApiSnapshotDeps = {},
  ) {
    super(settings);
    this.fetchPage = deps.fetchPage ?? ((url) => lightFetch(url));
    this.transport = deps.transport ?? apiRequest;
    this.download = deps.download ?? ((url) => fetchBuffer(url, { timeout: 60_000 }));
  }

  protected async render(targetUrl: string, profile: QualityProfile): Promise<CaptureResult> {
    // ── 1. Page HTML → date ────────────────────────────────
    const page = await this.fetchPage(targetUrl);
    if (page.statusCode >= 400) {
      return { status: 'failed', reason: `HTTP ${page.statusCode} from ${targetUrl}` };
    }

    const extraction = this.extractDate(page.body);
    if (!extraction) {
      return { status: 'not-found' };
    }

    // ── 2. Ask the API to render the page ──────────────────
    const response = await this.transport({
      method: 'GET',
      url: this.screenshotApiUrl,
      searchParams: {
        url: targetUrl,
        screenshot: 'true',
        'screenshot.fullPage': 'true',
        'screenshot.type': 'png',
        'viewport.width': String(profile.width),
        'viewport.height': String(profile.height),
        'viewport.deviceScaleFactor': String(profile.deviceScaleFactor),
        meta: 'false',
      },
    });

    if (response.statusCode >= 400) {
      return {
        status: 'failed',
        reason: `screenshot API answered HTTP ${response.statusCode}: ${response.body.slice(0, 200)}`,
      };
    }

    const screenshotUrl = readScreenshotUrl(response.body);
    if (!screenshotUrl) {
      return { status: 'failed', reason: 'screenshot API response carried no screenshot URL' };
    }

    // ── 3. Download the rendered PNG ───────────────────────
    const image = await this.download(screenshotUrl);
    if (image.statusCode >= 400 || image.body.length === 0) {
      return { status: 'failed', reason: `screenshot download failed with HTTP ${image.statusCode}` };
    }

    await writeFileAtomic(this.imagePath, image.body);
    this.logger.info(`Saved API-rendered snapshot (${image.body.length} bytes) to ${this.imagePath}`);

    return {
      status: 'captured',
      date: extraction.date,
      imagePath: this.imagePath,
      contentType: image.contentType ?? 'image/png',
      extraction,
    };
  }
}

/** Pull `data.screenshot.url` out of the API's JSON answer. */
export function readScreenshotUrl(body: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || !('data' in parsed)) return null;
  const data = parsed.data;
  if (typeof data !== 'object' || data === null || !('screenshot' in data)) return null;
  const screenshot = data.screenshot;
  if (typeof screenshot !== 'object' || screenshot === null || !('url' in screenshot)) return null;

  const url = screenshot.url;
  return typeof url === 'string' && url.length > 0 ? url : null;
}
