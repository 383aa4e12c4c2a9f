import { createReadStream } from 'node:fs';

/**
 * インフラ層: ファイルに保存されたフィードをチャンク単位で読み出す
 *
 * チャンク境界はメッセージ境界と一致しない。境界の処理は StreamingMessageDecoder が担う。
 * @param path 入力ファイルのパス
 * @param highWaterMark 1 チャンクの最大バイト数
 */
export async function* readFeedFile(path: string, highWaterMark = 64 * 1024): AsyncGenerator<Uint8Array> {
  const stream = createReadStream(path, { highWaterMark });
  for await (const chunk of stream) {
    if (!(chunk instanceof Uint8Array)) {
      throw new TypeError(`expected binary chunk from ${path}`);
    }
    yield chunk;
  }
}
