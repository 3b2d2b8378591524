/**
 * @file コメント設定（拡張子/パス → コメンタ）
 * 備考: 特記事項なし
 * - 拡張子はパス中の最後の '.' 以降（'.' が無ければパス全体）
 * - 単一指定の "any" は全拡張子に一致する
 * - files 指定時はパスへの正規表現一致でも採用する
 * - 宣言順で最初に一致した設定を用い、一致しなければ undefined
 */
import { BlockComment } from '../comments/block-comment.ts';
import { LineComment } from '../comments/line-comment.ts';
import type { Commenter, ResolvedCommenter } from '../comments/types.ts';
import type { CommentLookup } from '../licensing/types.ts';
import { compileConfigRegex } from './regex-list.ts';
import type { CommentEntry, CommenterEntry } from './schema.ts';

/**
 * パスから拡張子を取り出す
 * @param filename ファイルパス
 * @returns 拡張子（例: "test.py" → "py"）
 */
export function getFiletype(filename: string): string {
  const parts = filename.split('.');
  return parts[parts.length - 1] ?? '';
}

/**
 * 設定値からコメンタを生成する
 * @param entry commenter セクション
 * @returns コメンタ
 */
export function buildCommenter(entry: CommenterEntry): Commenter {
  // 行コメントはマーカーと末尾空行のみ
  if (entry.type === 'line') return new LineComment(entry.comment_char, entry.trailing_lines);
  return new BlockComment(entry.start_block_char, entry.end_block_char, {
    trailingLines: entry.trailing_lines,
    ...(entry.per_line_char === undefined ? {} : { perLineChar: entry.per_line_char }),
  });
}

export class CommentConfig {
  private readonly extensions: readonly string[];
  private readonly matchesAny: boolean;
  private readonly files: RegExp | undefined;
  readonly columns: number | undefined;
  readonly commenter: Commenter;

  constructor(entry: CommentEntry) {
    const ext = entry.extension ?? entry.extensions;
    this.extensions = ext === undefined ? [] : typeof ext === 'string' ? [ext] : ext;
    // "any" は単一指定のときのみ特別扱い
    this.matchesAny = typeof ext === 'string' && ext === 'any';
    this.files = entry.files === undefined ? undefined : compileConfigRegex(entry.files, 'comment files');
    this.columns = entry.columns;
    this.commenter = buildCommenter(entry.commenter);
  }

  /**
   * 拡張子またはパスで一致判定する
   * @param fileType 拡張子
   * @param filename ファイルパス
   * @returns 一致すれば true
   */
  matches(fileType: string, filename: string): boolean {
    if (this.matchesAny || this.extensions.includes(fileType)) return true;
    return this.files !== undefined && this.files.test(filename);
  }

  resolve(): ResolvedCommenter {
    return this.columns === undefined ? { commenter: this.commenter } : { columns: this.columns, commenter: this.commenter };
  }
}

export class CommentConfigList implements CommentLookup {
  private readonly cfgs: readonly CommentConfig[];

  constructor(entries: readonly CommentEntry[]) {
    this.cfgs = entries.map((e) => new CommentConfig(e));
  }

  getCommenter(filename: string): ResolvedCommenter | undefined {
    const fileType = getFiletype(filename);
    return this.cfgs.find((c) => c.matches(fileType, filename))?.resolve();
  }
}
