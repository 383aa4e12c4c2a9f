import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { concat, SYSTEM_EVENT_BYTES, TRADE_REPORT_BYTES } from '@test/unit/helpers/fixtures/topsBytes';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readFeedFile } from '@/infra/source/FileFeedSource';

/**
 * 単体テスト: readFeedFile
 *
 * 一時ディレクトリにフィードを書き出して読み戻す。
 */
describe('readFeedFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'tops-feed-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('指定したチャンクサイズで分割して読み出す', async () => {
    const feed = concat(SYSTEM_EVENT_BYTES, TRADE_REPORT_BYTES);
    const file = path.join(dir, 'feed.bin');
    await writeFile(file, feed);

    const chunks: Uint8Array[] = [];
    for await (const chunk of readFeedFile(file, 16)) {
      chunks.push(chunk);
    }

    expect(chunks.map((chunk) => chunk.length)).toEqual([16, 16, 16]);
    expect(concat(...chunks)).toEqual(feed);
  });

  it('存在しないファイルはエラー', async () => {
    const consume = async () => {
      for await (const _chunk of readFeedFile(path.join(dir, 'missing.bin'))) {
        // 読み出しは起きない
      }
    };

    await expect(consume()).rejects.toThrow(/ENOENT/);
  });
});
