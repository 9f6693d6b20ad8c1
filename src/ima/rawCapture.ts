import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import type { StreamStats } from './stream.js';
import type { RawLogSettings } from './types.js';

export type CaptureInput = {
  traceId: string;
  attempt: number;
  question?: string;
  stats: StreamStats;
};

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

function fileStamp(d: Date): string {
  return (
    `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_` +
    `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}_${pad(d.getMilliseconds(), 3)}`
  );
}

// Raw event-stream dumps for debugging upstream responses.
export class RawCapture {
  constructor(
    private readonly settings: RawLogSettings,
    private readonly log: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  shouldPersist(streamError: string | undefined): boolean {
    if (!this.settings.enabled) return false;
    return streamError ? true : this.settings.onSuccess;
  }

  async persist({ traceId, attempt, question, stats }: CaptureInput): Promise<string | undefined> {
    if (!this.shouldPersist(stats.streamError)) return undefined;

    const at = this.clock();
    const target = path.join(this.settings.dir, `sse_${fileStamp(at)}_${traceId}_attempt${attempt + 1}.log`);
    const encoded = Buffer.from(stats.fullResponse, 'utf8');
    const truncated = this.settings.maxBytes > 0 && encoded.length > this.settings.maxBytes;
    const body = truncated ? encoded.subarray(0, this.settings.maxBytes) : encoded;

    let preview = question?.trim();
    if (preview && preview.length > 200) preview = `${preview.slice(0, 200)}...`;

    const metadata = {
      timestamp: at.toISOString(),
      traceId,
      attempt: attempt + 1,
      question: preview ?? null,
      chunkCount: stats.chunkCount,
      parsedCount: stats.parsedCount,
      failedCount: stats.failedCount,
      elapsedSeconds: Math.round(stats.elapsedMs) / 1000,
      responseBytes: encoded.length,
      truncated,
      streamError: stats.streamError ?? null,
    };

    try {
      await mkdir(this.settings.dir, { recursive: true });
      await writeFile(target, `${JSON.stringify(metadata, null, 2)}\n\n${body.toString('utf8')}`, 'utf8');
      this.log.info({ file: target, traceId }, 'Saved raw event stream');
      return target;
    } catch (err) {
      this.log.error({ err }, 'Failed to save raw event stream');
      return undefined;
    }
  }
}
