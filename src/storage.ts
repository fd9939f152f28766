import fs from 'node:fs';
import path from 'node:path';
import pLimit from 'p-limit';
import type { PageRecord } from './types.js';

export interface ContentSink {
  append(record: PageRecord): Promise<void>;
}

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

/** Append-only JSON Lines file: one record per line, never rewritten. */
export class JsonlSink implements ContentSink {
  private limit = pLimit(1);

  constructor(readonly filePath: string) {
    ensureDir(path.dirname(filePath));
  }

  append(record: PageRecord): Promise<void> {
    const line = JSON.stringify(record) + '\n';
    return this.limit(async () => {
      await fs.promises.appendFile(this.filePath, line, 'utf-8');
      console.log(`[sink] saved ${record.url} status=${record.status_code}`);
    });
  }
}
