/**
 * @file テンプレート描画パラメータ
 * 備考: 特記事項なし
 * - 著者は `Name <email>` または `Name` を ", " で連結する
 * - endYear 未指定時は現在年を用いる
 * - startYear が終了年と異なる場合のみ "start, end" の範囲表記とする
 */

/** 著作権者 1 名 */
export type CopyrightHolder = Readonly<{
  name: string;
  email?: string;
}>;

/** 描画パラメータ */
export type Context = Readonly<{
  ident: string;
  authors: readonly CopyrightHolder[];
  endYear?: string;
  startYear?: string;
  unwrapText: boolean;
}>;

/**
 * 著者 1 名を表示形式へ変換する
 * @param holder 著作権者
 * @returns `Name <email>` または `Name`
 */
export function formatHolder(holder: CopyrightHolder): string {
  return holder.email === undefined ? holder.name : `${holder.name} <${holder.email}>`;
}

/**
 * 著者一覧を連結する
 * @param context 描画パラメータ
 * @returns ", " 区切りの著者表記
 */
export function getAuthors(context: Context): string {
  return context.authors.map(formatHolder).join(', ');
}

/**
 * 年表記を求める
 * @param context 描画パラメータ
 * @param now 現在時刻（テスト用に差し替え可能）
 * @returns 単年または "start, end"
 */
export function getYear(context: Context, now: Date = new Date()): string {
  const endYear = context.endYear ?? String(now.getFullYear());
  // 同一年の範囲は単年へ畳む
  if (context.startYear !== undefined && context.startYear !== endYear) {
    return `${context.startYear}, ${endYear}`;
  }

  return endYear;
}
