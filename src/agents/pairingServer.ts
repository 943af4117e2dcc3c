/**
 * pairingServer.ts — Show the WhatsApp Web pairing code to a human.
 *
 * The courier usually runs headless on a server, so the QR code that links
 * the Session Channel has to be published somewhere a phone can scan it:
 *
 *   • `PairingBoard` holds the latest code (and mirrors it to
 *     `<cacheDir>/pairing-code.png`);
 *   • `startPairingServer` serves it over HTTP:
 *       GET /                  — auto-refreshing HTML page
 *       GET /pairing-code.png  — the current code
 *       GET /status            — `{ state, updatedAt }` as JSON
 *
 * The server only reads the board; the Session Channel is the only writer.
 */

import { createServer, type Server } from 'http';
import { join } from 'path';
import type { PairingSnapshot } from '../core/types';
import { Logger } from '../core/logger';
import { removeFile, writeFileAtomic } from '../services/atomicFile';

const logger = new Logger('PairingServer');

export const PAIRING_CODE_FILE = 'pairing-code.png';

const REFRESH_SECONDS = 5;

export class PairingBoard {
  private current: PairingSnapshot = { state: 'idle', updatedAt: null, image: null };
  readonly imagePath: string | null;

  /** Pass `null` to keep the board in memory only. */
  constructor(
    cacheDir: string | null,
    private readonly now: () => number = Date.now,
  ) {
    this.imagePath = cacheDir === null ? null : join(cacheDir, PAIRING_CODE_FILE);
  }

  snapshot(): PairingSnapshot {
    return this.current;
  }

  async showCode(image: Buffer): Promise<void> {
    this.current = { state: 'waiting-for-scan', updatedAt: this.now(), image };
    if (this.imagePath) {
      await writeFileAtomic(this.imagePath, image);
    }
  }

  async markPaired(): Promise<void> {
    this.current = { state: 'paired', updatedAt: this.now(), image: null };
    await this.removeImage();
  }

  async markTimedOut(): Promise<void> {
    this.current = { state: 'timed-out', updatedAt: this.now(), image: null };
    await this.removeImage();
  }

  private async removeImage(): Promise<void> {
    if (this.imagePath) {
      await removeFile(this.imagePath);
    }
  }
}

// ─── HTTP ───────────────────────────────────────────────────

export function renderStatusPage(snapshot: PairingSnapshot): string {
  const body =
    snapshot.state === 'waiting-for-scan' && snapshot.image
      ? `<p>Scan this code with WhatsApp → Linked devices.</p>
    <img src="/pairing-code.png?t=${snapshot.updatedAt ?? 0}" alt="Pairing code" />`
      : `<p>State: <strong>${snapshot.state}</strong></p>`;

  return `<!doctype html>
<html>
  <head>
    <meta charset="utf-8" />
    <meta http-equiv="refresh" content="${REFRESH_SECONDS}" />
    <title>Cause-list courier pairing</title>
  </head>
  <body>
    <h1>Cause-list courier</h1>
    ${body}
  </body>
</html>
`;
}

export function startPairingServer(board: PairingBoard, port: number): Server {
  const server = createServer((req, res) => {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    const snapshot = board.snapshot();

    if (req.method !== 'GET') {
      res.writeHead(405, { allow: 'GET' }).end();
      return;
    }

    switch (path) {
      case '/':
        res.writeHead(200, { 'content-type': 'text/html; charset=utf-8' });
        res.end(renderStatusPage(snapshot));
        return;
      case '/pairing-code.png':
        if (!snapshot.image) {
          res.writeHead(404, { 'content-type': 'text/plain' }).end('No pairing code is being shown');
          return;
        }
        res.writeHead(200, { 'content-type': 'image/png', 'cache-control': 'no-store' });
        res.end(snapshot.image);
        return;
      case '/status':
        res.writeHead(200, { 'content-type': 'application/json' });
        res.end(JSON.stringify({ state: snapshot.state, updatedAt: snapshot.updatedAt }));
        return;
      default:
        res.writeHead(404, { 'content-type': 'text/plain' }).end('Not found');
    }
  });

  server.on('error', (err) => {
    logger.error(`Pairing status page failed on port ${port}`, err);
  });
  server.listen(port, () => {
    logger.info(`Pairing status page listening on http://localhost:${port}/`);
  });
  return server;
}
