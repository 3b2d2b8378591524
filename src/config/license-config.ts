/**
 * @file ライセンス設定（パス → テンプレート/replaces）
 * 備考: 特記事項なし
 * - files は "any"、単一の正規表現、正規表現のリストのいずれか
 * - auto_template の設定は resolveTemplates で SPDX から本文を解決してから使う
 * - use_dynamic_year_ranges では git のコミット年から年範囲を決め、明示した年を優先する
 * - 宣言順で最初に一致した設定を用いる
 */
import { ConfigError } from '../errors.ts';
import { getGitYearsForFile } from '../git/git.ts';
import type { LicenseLookup } from '../licensing/types.ts';
import type { TemplateFetcher } from '../spdx/spdx.ts';
import type { Context } from '../template/context.ts';
import { Template } from '../template/template.ts';
import { RegexList, compileConfigRegex } from './regex-list.ts';
import type { LicenseEntry } from './schema.ts';

/** ファイルのコミット年（新しい順）を返す関数 */
export type YearSource = (filename: string) => readonly string[];

/** パス一致の方式 */
type FileMatcher =
  | { readonly kind: 'any' }
  | { readonly kind: 'single'; readonly regex: RegExp }
  | { readonly kind: 'list'; readonly list: RegexList };

/**
 * files 設定から一致方式を決める
 * @param files 設定値
 * @returns 一致方式
 */
function toFileMatcher(files: string | readonly string[]): FileMatcher {
  if (files === 'any') return { kind: 'any' };
  if (typeof files === 'string') return { kind: 'single', regex: compileConfigRegex(files, 'license files') };
  return { kind: 'list', list: new RegexList(files, 'license files') };
}

export class LicenseConfig {
  readonly ident: string;
  private readonly entry: LicenseEntry;
  private readonly matcher: FileMatcher;
  private readonly replaces: readonly RegExp[] | undefined;
  private readonly yearSource: YearSource;
  private template: string | undefined;

  constructor(entry: LicenseEntry, yearSource: YearSource = (f) => getGitYearsForFile(f)) {
    this.entry = entry;
    this.ident = entry.ident;
    this.matcher = toFileMatcher(entry.files);
    this.replaces = entry.replaces?.map((r) => compileConfigRegex(r, 'replaces'));
    this.yearSource = yearSource;
    this.template = entry.template;
  }

  /** SPDX からの解決が必要か */
  get needsFetch(): boolean {
    return this.template === undefined && this.entry.auto_template;
  }

  /**
   * auto_template の本文を取得して保持する
   * @param fetcher テンプレート取得関数
   */
  async resolveTemplate(fetcher: TemplateFetcher): Promise<void> {
    // 明示テンプレートや解決済みなら取得しない
    if (!this.needsFetch) return;
    this.template = await fetcher(this.ident);
  }

  fileIsMatch(filename: string): boolean {
    switch (this.matcher.kind) {
      case 'any':
        return true;
      case 'single':
        return this.matcher.regex.test(filename);
      case 'list':
        return this.matcher.list.isMatch(filename);
    }
  }

  /**
   * ファイル用のテンプレートを生成する
   * @param filename 対象ファイル（動的年範囲の算出に使う）
   * @returns テンプレート
   */
  getTemplate(filename: string): Template {
    // 解決前の auto_template はここへ来ない前提（読み込み時に解決する）
    if (this.template === undefined) {
      throw new ConfigError(`license template for ${this.ident} has not been resolved`);
    }

    const context: Context = {
      ident: this.ident,
      authors: this.entry.authors,
      unwrapText: this.entry.unwrap_text,
      ...this.years(filename),
    };

    return new Template(this.template, context, this.entry.auto_template);
  }

  getReplaces(): readonly RegExp[] | undefined {
    return this.replaces;
  }

  private years(filename: string): { endYear?: string; startYear?: string } {
    const endYear = this.entry.end_year ?? this.entry.year;
    const startYear = this.entry.start_year;
    // 動的範囲なしなら設定値のまま
    if (!this.entry.use_dynamic_year_ranges) return { endYear, startYear };

    const gitYears = this.yearSource(filename);
    const gitEnd = gitYears[0];
    const gitStart = gitYears[gitYears.length - 1];
    return { endYear: endYear ?? gitEnd, startYear: startYear ?? gitStart };
  }
}

export class LicenseConfigList implements LicenseLookup {
  readonly cfgs: readonly LicenseConfig[];

  constructor(entries: readonly LicenseEntry[], yearSource?: YearSource) {
    this.cfgs = entries.map((e) => new LicenseConfig(e, yearSource));
  }

  /**
   * auto_template の設定をすべて解決する（識別子ごとに 1 回だけ取得）
   * @param fetcher テンプレート取得関数
   */
  async resolveTemplates(fetcher: TemplateFetcher): Promise<void> {
    const cache = new Map<string, Promise<string>>();
    const cached: TemplateFetcher = (ident) => {
      const hit = cache.get(ident);
      if (hit) return hit;
      const pending = fetcher(ident);
      cache.set(ident, pending);
      return pending;
    };

    for (const cfg of this.cfgs) {
      await cfg.resolveTemplate(cached);
    }
  }

  getTemplate(filename: string): Template | undefined {
    return this.cfgs.find((c) => c.fileIsMatch(filename))?.getTemplate(filename);
  }

  getReplaces(filename: string): readonly RegExp[] | undefined {
    return this.cfgs.find((c) => c.fileIsMatch(filename))?.getReplaces();
  }
}
