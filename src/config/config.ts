/**
 * @file 解決済み設定と YAML からの構築
 * 備考: 特記事項なし
 * - YAML は yaml パッケージで読み、スキーマ検証は zod で行う
 * - 検証エラーは「ファイル: パス: 理由」の形へ整形して ConfigError とする
 * - Config は判定エンジンが要求する LicensingConfig を満たす
 */
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { ConfigError, describeCause } from '../errors.ts';
import type { LicensingConfig } from '../licensing/types.ts';
import type { TemplateFetcher } from '../spdx/spdx.ts';
import { CommentConfigList } from './comment-config.ts';
import { LicenseConfigList, type YearSource } from './license-config.ts';
import { RegexList } from './regex-list.ts';
import { configFileSchema, type ConfigFile } from './schema.ts';

export class Config implements LicensingConfig {
  changeInPlace: boolean;
  readonly excludes: RegexList;
  readonly licenses: LicenseConfigList;
  readonly comments: CommentConfigList;

  constructor(file: ConfigFile, yearSource?: YearSource) {
    this.changeInPlace = file.change_in_place;
    this.excludes = new RegexList(file.excludes);
    this.licenses = new LicenseConfigList(file.licenses, yearSource);
    this.comments = new CommentConfigList(file.comments);
  }

  /**
   * 除外パターンを追加する
   * @param pattern 正規表現文字列
   */
  addExclude(pattern: string): void {
    this.excludes.addExclude(pattern);
  }

  /**
   * auto_template のライセンス本文を取得する（バッチ開始前に 1 回）
   * @param fetcher テンプレート取得関数
   */
  async resolveTemplates(fetcher: TemplateFetcher): Promise<void> {
    await this.licenses.resolveTemplates(fetcher);
  }
}

/**
 * zod の検証エラーを 1 行ずつの説明へ整形する
 * @param issues 検証エラー
 * @returns 説明文
 */
function formatIssues(issues: readonly ZodIssue[]): string {
  return issues.map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`).join('; ');
}

/**
 * YAML テキストから Config を構築する
 * @param text YAML テキスト
 * @param source エラー表示用のファイルパス
 * @param yearSource 動的年範囲用のコミット年取得関数
 * @returns 設定
 */
export function parseConfig(text: string, source: string, yearSource?: YearSource): Config {
  let raw: unknown;
  // 構文エラーはファイルパス付きで報告する
  try {
    raw = parseYaml(text);
  } catch (e) {
    throw new ConfigError(`Invalid YAML in ${source}: ${describeCause(e)}`, { cause: e });
  }

  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid config in ${source}: ${formatIssues(parsed.error.issues)}`);
  }

  // 正規表現の不正はどのファイル由来かを付けて報告する
  try {
    return new Config(parsed.data, yearSource);
  } catch (e) {
    if (e instanceof ConfigError) throw new ConfigError(`Invalid config in ${source}: ${e.message}`, { cause: e });
    throw e;
  }
}
