/**
 * @file 行コメント（各行の先頭へマーカーを付与）
 * 備考: 特記事項なし
 * - 空行は `マーカー\n`、それ以外は `マーカー 行\n` とする
 * - 桁指定時は commentWidth を差し引いた幅で折り返す
 * - 末尾に trailingLines 個の空行を追加する
 */
import { fill } from '../text/wrap.ts';
import type { Comment } from './types.ts';

/**
 * テキストを行配列へ分割する（末尾の改行 1 つは行を増やさない）
 * @param text 対象テキスト
 * @returns 行配列（空テキストは空行 1 つ）
 */
function toLines(text: string): string[] {
  const lines = text.split('\n');
  // 末尾改行による空要素を除く（ただし最低 1 行は残す）
  if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
  return lines.map((l) => (l.endsWith('\r') ? l.slice(0, -1) : l));
}

export class LineComment implements Comment {
  readonly kind = 'line';
  readonly character: string;
  readonly trailingLines: number;

  constructor(character: string, trailingLines = 0) {
    this.character = character;
    this.trailingLines = trailingLines;
  }

  /**
   * 末尾空行数を変更した複製を返す
   * @param trailingLines 追加する空行数
   * @returns 新しいインスタンス
   */
  withTrailingLines(trailingLines: number): LineComment {
    return new LineComment(this.character, trailingLines);
  }

  /** ブロック内部で使うため末尾空行を持たない複製を返す */
  skipTrailingLines(): LineComment {
    return this.withTrailingLines(0);
  }

  comment(text: string, columns?: number): string {
    const width = this.commentWidth();
    // マーカー分を差し引いても幅が残る場合のみ差し引く
    const wrapped = columns === undefined ? text : fill(text, columns > width ? columns - width : columns);

    let out = '';
    for (const line of toLines(wrapped)) {
      out += line === '' ? `${this.character}\n` : `${this.character} ${line}\n`;
    }

    return out + '\n'.repeat(this.trailingLines);
  }

  commentWidth(): number {
    return this.character.length + 1;
  }
}
