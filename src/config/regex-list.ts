/**
 * @file パス判定用の正規表現リスト
 * 備考: 特記事項なし
 * - いずれかのパターンが部分一致すれば一致とみなす（アンカーなし）
 * - 不正なパターンは ConfigError として報告する
 */
import { ConfigError } from '../errors.ts';
import { compileRegex } from '../text/regex.ts';

/**
 * 設定の正規表現文字列をコンパイルする
 * @param source 正規表現文字列
 * @param what エラー表示用の項目名
 * @returns コンパイル済み正規表現
 */
export function compileConfigRegex(source: string, what: string): RegExp {
  return compileRegex(source, (reason) => new ConfigError(`Failed to compile ${what} pattern ${JSON.stringify(source)}: ${reason}`));
}

export class RegexList {
  private patterns: RegExp[];

  constructor(sources: readonly string[], what = 'exclude') {
    this.patterns = sources.map((s) => compileConfigRegex(s, what));
  }

  isMatch(path: string): boolean {
    return this.patterns.some((p) => p.test(path));
  }

  /**
   * 先頭にパターンを追加する
   * @param source 正規表現文字列
   */
  addExclude(source: string): void {
    this.patterns = [compileConfigRegex(source, 'exclude'), ...this.patterns];
  }

  /** パターン文字列の一覧 */
  sources(): string[] {
    return this.patterns.map((p) => p.source);
  }
}
