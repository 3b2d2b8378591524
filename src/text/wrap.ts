/**
 * @file 指定桁での単語折り返し
 * 備考: 特記事項なし
 * - 改行で区切られた各行を独立に折り返し、空行と明示改行を保持する
 * - 行頭インデントは最初の出力行にのみ残す
 * - 各出力行の末尾空白は除去する
 * - 桁を超える単語は桁幅ごとに分割する
 * - 幅は code point 数で数える
 */

/**
 * 文字列の表示幅（code point 数）
 * @param s 対象文字列
 * @returns 幅
 */
function widthOf(s: string): number {
  return [...s].length;
}

/**
 * 桁を超える単語を桁幅ごとの断片へ分割する
 * @param word 単語
 * @param width 桁幅
 * @returns 断片の配列（幅以内ならそのまま 1 要素）
 */
function splitLongWord(word: string, width: number): string[] {
  const chars = [...word];
  // 幅以内の単語は分割しない
  if (chars.length <= width) return [word];
  const pieces: string[] = [];
  for (let i = 0; i < chars.length; i += width) {
    pieces.push(chars.slice(i, i + width).join(''));
  }

  return pieces;
}

/**
 * 1 行を折り返して出力行の配列を返す
 * @param line 改行を含まない 1 行
 * @param width 桁幅
 * @returns 出力行
 */
function wrapLine(line: string, width: number): string[] {
  const trimmed = line.trimEnd();
  // 収まる行は末尾空白の除去のみ
  if (widthOf(trimmed) <= width) return [trimmed];

  const indent = /^ */.exec(trimmed)?.[0] ?? '';
  const words = trimmed.slice(indent.length).split(/ +/);
  const out: string[] = [];
  let current = indent;
  let hasWord = false;

  for (const word of words) {
    for (const piece of splitLongWord(word, width)) {
      // 行頭の語は幅に関係なく置く（インデント込みで超える場合も含む）
      if (!hasWord) {
        current += piece;
        hasWord = true;
        continue;
      }

      const candidate = `${current} ${piece}`;
      if (widthOf(candidate) <= width) {
        current = candidate;
      } else {
        out.push(current);
        current = piece;
      }
    }
  }

  out.push(current);
  return out;
}

/**
 * テキストを桁幅で折り返す
 * @param text 対象テキスト
 * @param width 桁幅（1 未満は 1 とみなす）
 * @returns 折り返し後のテキスト
 */
export function fill(text: string, width: number): string {
  const w = Math.max(1, Math.floor(width));
  return text
    .split('\n')
    .map((line) => wrapLine(line, w).join('\n'))
    .join('\n');
}
