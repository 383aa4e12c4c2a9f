import type { SymbolFactory } from '@/domain/models/SymbolFactory';

/**
 * インターン済みシンボルのハンドル（SymbolInterner ごとに一意）。
 */
export type SymbolId = number;

/**
 * インフラ層: シンボル文字列を数値ハンドルにインターンする
 *
 * 銘柄数は数千程度で頭打ちになるため、テーブルは縮小しない。
 * factory をそのままデコーダのシンボルファクトリとして渡せる。
 */
export class SymbolInterner {
  private readonly ids = new Map<string, SymbolId>();
  private readonly texts: string[] = [];

  /**
   * デコーダに渡すファクトリ。this を束縛済み。
   */
  readonly factory: SymbolFactory<SymbolId> = (text) => this.intern(text);

  /**
   * 文字列に対応するハンドルを返す。初出なら新しいハンドルを割り当てる。
   */
  intern(text: string): SymbolId {
    const existing = this.ids.get(text);
    if (existing !== undefined) {
      return existing;
    }
    const id = this.texts.length;
    this.texts.push(text);
    this.ids.set(text, id);
    return id;
  }

  /**
   * ハンドルから元の文字列を引く。未知のハンドルなら undefined。
   */
  resolve(id: SymbolId): string | undefined {
    return this.texts[id];
  }

  get size(): number {
    return this.texts.length;
  }
}
