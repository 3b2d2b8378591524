/**
 * @file ライセンステンプレートの描画と年可変パターンの生成
 * 備考: 特記事項なし
 * - 置換トークンは既定（[year] 等）と SPDX 形式のいずれか 1 組のみを使う
 * - 置換は年 → 著者 → 識別子の順にリテラルで行う
 * - 年可変パターンは「番兵で描画 → コメント化 → 番兵で分割 → 断片をエスケープ → 年パターンで連結」の順で組み立てる
 * - 番兵は実際の年と同じ 4 文字とし、折り返し位置を本来のヘッダと一致させる
 * - 年範囲 "YYYY, YYYY" は単年と折り返し位置が変わるため、開始/終了の番兵 2 つで描画した版も作る
 * - パターン生成で元の Context は変更しない（複製して番兵を入れる）
 */
import type { Comment } from '../comments/types.ts';
import { PatternError } from '../errors.ts';
import { compileRegex, escapeRegex } from '../text/regex.ts';
import { removeColumnWrapping } from '../text/unwrap.ts';
import { getAuthors, getYear, type Context } from './context.ts';

/** 年位置に一時的に差し込む番兵（4 文字、ライセンス文と衝突しない） */
export const INTERMEDIATE_YEAR_TOKEN = '@YR@';

/** 年範囲の開始/終了位置の番兵 */
export const RANGE_START_TOKEN = '@YS@';
export const RANGE_END_TOKEN = '@YE@';

/** 4 桁年、または "YYYY, YYYY" の範囲 */
export const YEAR_RE = '[0-9]{4}(, [0-9]{4})?';

/** 範囲の片側 1 年 */
const SINGLE_YEAR_RE = '[0-9]{4}';

/** 年の描画形 */
type YearShape = 'single' | 'range';

/** 年/著者/識別子の置換トークン組 */
export type ReplacementTokens = readonly [year: string, author: string, ident: string];

const DEFAULT_TOKENS: ReplacementTokens = ['[year]', '[name of author]', '[ident]'];
/** Apache-2.0 の標準ヘッダ形式 */
const APACHE_TOKENS: ReplacementTokens = ['[yyyy]', '[name of copyright owner]', '[ident]'];

/**
 * 全出現箇所をリテラル置換する
 * @param text 対象
 * @param token 置換トークン
 * @param value 置換値
 * @returns 置換後文字列
 */
function replaceAllLiteral(text: string, token: string, value: string): string {
  return text.split(token).join(value);
}

export class Template {
  readonly content: string;
  readonly context: Context;
  readonly spdxTemplate: boolean;

  constructor(content: string, context: Context, spdxTemplate = false) {
    this.content = content;
    this.context = context;
    this.spdxTemplate = spdxTemplate;
  }

  /**
   * SPDX トークンの使用有無を切り替えた複製を返す
   * @param spdxTemplate SPDX 形式のトークンを使うか
   * @returns 新しいテンプレート
   */
  withSpdxTemplate(spdxTemplate: boolean): Template {
    return new Template(this.content, this.context, spdxTemplate);
  }

  /** 現在の Context でヘッダ本文を描画する */
  render(): string {
    return this.interpolate(this.context);
  }

  /**
   * 年だけが異なる既存ヘッダに一致するパターン（末尾まで厳密）
   * @param commenter 対象ファイルのコメンタ
   * @param columns 折り返し桁
   * @returns コンパイル済みパターン
   */
  outdatedLicensePattern(commenter: Comment, columns?: number): RegExp {
    return this.buildYearVaryingPattern(commenter, columns, 'single', false);
  }

  /**
   * 末尾空白を許容する版。ヘッダ直後に空行が無いファイル向け。
   * @param commenter 対象ファイルのコメンタ
   * @param columns 折り返し桁
   * @returns コンパイル済みパターン
   */
  outdatedLicenseTrimmedPattern(commenter: Comment, columns?: number): RegExp {
    return this.buildYearVaryingPattern(commenter, columns, 'single', true);
  }

  /**
   * 既存ヘッダを探すパターンを試す順に返す。
   * 単年の厳密/末尾空白許容の後に、年範囲として折り返された版の厳密/末尾空白許容を続ける。
   * @param commenter 対象ファイルのコメンタ
   * @param columns 折り返し桁
   * @returns パターン列
   */
  outdatedLicensePatterns(commenter: Comment, columns?: number): RegExp[] {
    return [
      this.buildYearVaryingPattern(commenter, columns, 'single', false),
      this.buildYearVaryingPattern(commenter, columns, 'single', true),
      this.buildYearVaryingPattern(commenter, columns, 'range', false),
      this.buildYearVaryingPattern(commenter, columns, 'range', true),
    ];
  }

  /** 内容に含まれるリテラルからトークン組を選ぶ */
  replacementTokens(): ReplacementTokens {
    // 既定形式はそのまま
    if (!this.spdxTemplate) return DEFAULT_TOKENS;
    // Apache 形式は専用の組
    if (this.content.includes('[name of copyright owner]')) return APACHE_TOKENS;

    let author = '<name of author>';
    if (this.content.includes('<copyright holders>')) {
      author = '<copyright holders>';
    } else if (this.content.includes('<owner>')) {
      author = '<owner>';
    }

    return ['<year>', author, '<ident>'];
  }

  /**
   * 指定 Context でトークンを置換する
   * @param context 描画パラメータ
   * @returns 描画結果
   */
  private interpolate(context: Context): string {
    const [yearToken, authorToken, identToken] = this.replacementTokens();
    // 事前折り返し済みのテンプレートは段落単位へ戻す
    const templ = this.context.unwrapText ? removeColumnWrapping(this.content) : this.content;

    let out = replaceAllLiteral(templ, yearToken, getYear(context));
    out = replaceAllLiteral(out, authorToken, getAuthors(context));
    return replaceAllLiteral(out, identToken, context.ident);
  }

  private buildYearVaryingPattern(
    commenter: Comment,
    columns: number | undefined,
    shape: YearShape,
    trimTrailing: boolean
  ): RegExp {
    // 範囲は YEAR_RE が吸収するため単年版では startYear は外す
    const context: Context =
      shape === 'single'
        ? { ...this.context, endYear: INTERMEDIATE_YEAR_TOKEN, startYear: undefined }
        : { ...this.context, endYear: RANGE_END_TOKEN, startYear: RANGE_START_TOKEN };

    let rendered = commenter.comment(this.interpolate(context), columns);
    if (trimTrailing) rendered = rendered.trimEnd();

    const source =
      shape === 'single'
        ? rendered.split(INTERMEDIATE_YEAR_TOKEN).map(escapeRegex).join(YEAR_RE)
        : rendered
            .split(RANGE_START_TOKEN)
            .map((part) => part.split(RANGE_END_TOKEN).map(escapeRegex).join(SINGLE_YEAR_RE))
            .join(SINGLE_YEAR_RE);
    return compileRegex(
      source,
      (reason) => new PatternError(`failed to compile year-varying pattern for ${this.context.ident}: ${reason}`)
    );
  }
}
