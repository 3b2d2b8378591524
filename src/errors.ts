/**
 * @file copyguard のエラー型定義
 * 備考: 特記事項なし
 * - すべてのエラーは CopyguardError を基底とし name を具象クラス名へ揃える
 * - 下位の原因は ES2022 の cause に保持し、メッセージへは要約のみ連結する
 * - 設定不一致（ライセンス/コメント設定なし）はエラーではなく統計で扱う
 * - I/O とパターン生成の失敗はバッチ全体を停止させる
 */

/** 共通基底。呼び出し側は instanceof で分類する */
export class CopyguardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * ファイル I/O の失敗。context に「操作 + パス」を保持する。
 * メッセージは `<context>: <原因メッセージ>` 形式。
 */
export class LicensingError extends CopyguardError {
  readonly context: string;

  constructor(context: string, cause: unknown) {
    super(`${context}: ${describeCause(cause)}`, { cause });
    this.context = context;
  }
}

/** 年可変パターンのコンパイル失敗（テンプレート不正） */
export class PatternError extends CopyguardError {}

/** 設定ファイルの構文/スキーマ/正規表現の不正 */
export class ConfigError extends CopyguardError {}

/** 設定ファイルが探索範囲に存在しない */
export class ConfigNotFoundError extends CopyguardError {
  constructor() {
    super('Config file not found');
  }
}

/** SPDX テンプレート取得の失敗 */
export class SpdxError extends CopyguardError {}

/** git コマンドの起動/出力解釈の失敗 */
export class GitError extends CopyguardError {}

/**
 * 原因値を 1 行のメッセージへ要約する
 * @param cause 任意の原因値
 * @returns 表示用メッセージ
 */
export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
