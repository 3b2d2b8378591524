/**
 * @file ブロックコメント（開始/終了デリミタで囲む）
 * 備考: 特記事項なし
 * - perLineChar 指定時は内部を末尾空行なしの行コメントへ委譲する
 * - 委譲なしでは桁指定時のみ折り返し、それ以外は原文のまま埋め込む
 * - 終了デリミタの後に trailingLines 個の改行を追加する
 */
import { fill } from '../text/wrap.ts';
import { LineComment } from './line-comment.ts';
import type { Comment } from './types.ts';

export class BlockComment implements Comment {
  readonly kind = 'block';
  readonly start: string;
  readonly end: string;
  readonly perLine: LineComment | undefined;
  readonly trailingLines: number;

  constructor(start: string, end: string, opts: { perLineChar?: string; trailingLines?: number } = {}) {
    this.start = start;
    this.end = end;
    this.perLine = opts.perLineChar === undefined ? undefined : new LineComment(opts.perLineChar).skipTrailingLines();
    this.trailingLines = opts.trailingLines ?? 0;
  }

  comment(text: string, columns?: number): string {
    let body: string;
    // 行ごとのマーカーがあれば行コメントへ委譲する
    if (this.perLine) {
      body = this.perLine.comment(text, columns);
    } else {
      body = columns === undefined ? text : fill(text, columns);
    }

    return this.start + body + this.end + '\n'.repeat(this.trailingLines);
  }

  commentWidth(): number {
    return this.perLine ? this.perLine.commentWidth() : 0;
  }
}
