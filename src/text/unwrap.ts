/**
 * @file 事前折り返し済みテキストの折り返し解除
 * 備考: 特記事項なし
 * - 直前が改行でない改行は空白へ置き換える
 * - 空行（段落区切り）は保持する
 */

/** 改行以外の文字に続く改行 */
const WRAPPED_NEWLINE = /([^\n])\n/g;

/**
 * 桁折り返しを解除する
 * 例: "a\nb\n\nc" → "a b\n\nc"
 * @param text 折り返し済みテキスト
 * @returns 段落ごとに 1 行へ連結したテキスト
 */
export function removeColumnWrapping(text: string): string {
  return text.replace(WRAPPED_NEWLINE, '$1 ').split(' \n').join('\n\n');
}
