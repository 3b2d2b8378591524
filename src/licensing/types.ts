/**
 * @file 判定エンジンが設定層から受け取るインターフェース
 * 備考: 特記事項なし
 * - エンジンは解決済みの設定のみを参照し、YAML やファイル探索を知らない
 * - ルックアップは宣言順で最初に一致したものを返す
 */
import type { ResolvedCommenter } from '../comments/types.ts';
import type { Template } from '../template/template.ts';

/** 除外パス判定 */
export interface ExcludeMatcher {
  isMatch(path: string): boolean;
}

/** ライセンス設定のルックアップ */
export interface LicenseLookup {
  getTemplate(path: string): Template | undefined;
  getReplaces(path: string): readonly RegExp[] | undefined;
}

/** コメント設定のルックアップ */
export interface CommentLookup {
  getCommenter(path: string): ResolvedCommenter | undefined;
}

/** エンジンが消費する解決済み設定 */
export interface LicensingConfig {
  readonly excludes: ExcludeMatcher;
  readonly licenses: LicenseLookup;
  readonly comments: CommentLookup;
  readonly changeInPlace: boolean;
}

/** 1 ファイルの判定結果 */
export type LicenseStatus =
  | { readonly kind: 'alreadyLicensed' }
  | { readonly kind: 'needsUpdate'; readonly content: string }
  | { readonly kind: 'noConfigMatched' }
  | { readonly kind: 'noCommenterMatched' };

/** バッチ 1 回分の集計（追記のみ） */
export type LicenseStats = {
  readonly filesNotLicensed: string[];
  readonly filesNeedingLicenseUpdate: string[];
  readonly filesNeedingCommenter: string[];
};

/** エンジンが使うファイル入出力 */
export interface FileIo {
  read(path: string): string;
  write(path: string, content: string): void;
  print(content: string): void;
}
