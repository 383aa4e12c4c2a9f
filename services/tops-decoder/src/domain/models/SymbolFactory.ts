/**
 * 固定長テキストフィールド（末尾の空白を除去済み）からシンボル値を生成する関数。
 *
 * デコーダはシンボルの表現を知らない。呼び出し側が文字列・インターン済み ID・
 * 独自のクラスなど任意の型を選べる。
 *
 * @template S 生成するシンボルの型
 */
export type SymbolFactory<S> = (text: string) => S;

/**
 * 文字列をそのままシンボルとして使う既定のファクトリ。
 */
export const stringSymbol: SymbolFactory<string> = (text) => text;
