import fs from 'fs';
import os from 'os';
import path from 'path';
import { ChannelId } from '../src/common/interfaces/monitor.interfaces';
import { Notifier, RenderedAlert } from '../src/common/interfaces/notifier.interface';
import { delay } from '../src/utils/utils';

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeJson(filePath: string, document: unknown): void {
  fs.writeFileSync(filePath, JSON.stringify(document, null, 2));
}

export async function waitFor(condition: () => boolean, timeoutMs = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition');
    }
    await delay(10);
  }
}

/**
 * Notifier that records what it was asked to send
 */
export class RecordingNotifier implements Notifier {
  readonly sent: RenderedAlert[] = [];

  constructor(
    readonly channel: ChannelId,
    private readonly behaviour: (attempt: number) => Promise<void> = async () => undefined,
  ) {}

  async send(alert: RenderedAlert): Promise<void> {
    this.sent.push(alert);
    await this.behaviour(this.sent.length);
  }
}
