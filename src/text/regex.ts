/**
 * @file 正規表現ユーティリティ
 * 備考: 特記事項なし
 * - リテラル文字列を正規表現の一部として安全に埋め込む
 * - 設定由来の正規表現文字列をコンパイルし、失敗は呼び出し側へ伝える
 */

/** 正規表現のメタ文字 */
const META_CHARS = /[.*+?^${}()|[\]\\]/g;

/**
 * 文字列をリテラル一致用にエスケープする
 * @param literal 対象文字列
 * @returns エスケープ済み文字列
 */
export function escapeRegex(literal: string): string {
  return literal.replace(META_CHARS, '\\$&');
}

/**
 * 正規表現をコンパイルする。失敗時は onError の戻り値を投げる。
 * @param source 正規表現文字列
 * @param onError 失敗理由からエラーを生成する関数
 * @returns コンパイル済み正規表現
 */
export function compileRegex(source: string, onError: (reason: string) => Error): RegExp {
  // 構文エラーを呼び出し側の分類へ変換する
  try {
    return new RegExp(source);
  } catch (e) {
    throw onError(e instanceof Error ? e.message : String(e));
  }
}

/**
 * 最初の一致箇所だけをリテラル文字列で置き換える（`$` の展開はしない）
 * @param content 対象テキスト
 * @param pattern 一致パターン（g フラグなし）
 * @param replacement 置換文字列
 * @returns 置換後テキスト（一致しなければ undefined）
 */
export function replaceFirstLiteral(content: string, pattern: RegExp, replacement: string): string | undefined {
  const m = pattern.exec(content);
  // 一致しなければ置換しない
  if (!m) return undefined;
  return content.slice(0, m.index) + replacement + content.slice(m.index + m[0].length);
}
