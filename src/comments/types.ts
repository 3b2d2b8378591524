/**
 * @file コメント整形の型定義
 * 備考: 特記事項なし
 * - Commenter は行コメントとブロックコメントの 2 種のみ（閉じた union）
 * - commentWidth はマーカー幅 + 区切り空白 1 桁（委譲なしブロックは 0）
 */
import type { BlockComment } from './block-comment.ts';
import type { LineComment } from './line-comment.ts';

/** テキストをコメントブロックへ変換する能力 */
export interface Comment {
  /**
   * テキストをコメント化する
   * @param text プレーンテキスト
   * @param columns 折り返し桁（未指定なら折り返さない）
   */
  comment(text: string, columns?: number): string;
  /** マーカーが消費する桁数 */
  commentWidth(): number;
}

/** 設定から生成されるコメンタ */
export type Commenter = LineComment | BlockComment;

/** ファイルに対して解決されたコメンタと折り返し桁 */
export type ResolvedCommenter = Readonly<{
  columns?: number;
  commenter: Commenter;
}>;
