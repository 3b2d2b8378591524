/**
 * @file 設定ファイルの探索・読み込み・既定設定の生成
 * 備考: 特記事項なし
 * - カレントディレクトリから上位へ .copyguard.yml を探し、無ければ XDG の全体設定を見る
 * - 見つからなければ ConfigNotFoundError を投げる
 * - auto_template の解決は読み込みの最後に 1 回だけ行う
 * - 既定設定はモジュール隣の default-config.yml を正とする
 */
import * as fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError, ConfigNotFoundError, describeCause } from '../errors.ts';
import type { Logger } from '../logger.ts';
import { fetchSpdxTemplate, type TemplateFetcher } from '../spdx/spdx.ts';
import { parseConfig, type Config } from './config.ts';
import type { YearSource } from './license-config.ts';

/** プロジェクト設定のファイル名 */
export const CONFIG_FILE_NAME = '.copyguard.yml';

/** 既定設定のテンプレート（このファイルの隣） */
const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('./default-config.yml', import.meta.url));

/**
 * XDG の設定ディレクトリ
 * @param env 環境変数
 * @returns ディレクトリ（HOME も無ければ undefined）
 */
export function xdgConfigDir(env: NodeJS.ProcessEnv = process.env): string | undefined {
  if (env.XDG_CONFIG_HOME) return env.XDG_CONFIG_HOME;
  if (env.HOME) return path.join(env.HOME, '.config');
  return undefined;
}

/**
 * 設定ファイルを探す
 * @param cwd 探索開始ディレクトリ
 * @param env 環境変数
 * @returns 見つかったパス（無ければ undefined）
 */
export function findConfigFile(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string | undefined {
  let dir = path.resolve(cwd);
  // ルートに達するまで上位へ辿る
  for (;;) {
    const candidate = path.join(dir, CONFIG_FILE_NAME);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  const globalDir = xdgConfigDir(env);
  if (globalDir === undefined) return undefined;
  const global = path.join(globalDir, 'copyguard', 'config.yml');
  return fs.existsSync(global) ? global : undefined;
}

export type LoadConfigOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  fetchTemplate?: TemplateFetcher;
  yearSource?: YearSource;
  logger?: Logger;
};

/**
 * 設定を探して読み込み、SPDX テンプレートまで解決する
 * @param opts 探索条件と差し替え可能な依存
 * @returns 解決済み設定
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<Config> {
  const file = findConfigFile(opts.cwd, opts.env);
  if (file === undefined) throw new ConfigNotFoundError();

  let text: string;
  // 読み込み失敗はパス付きで報告する
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (e) {
    throw new ConfigError(`Error loading config file ${file}: ${describeCause(e)}`, { cause: e });
  }

  const config = parseConfig(text, file, opts.yearSource);
  await config.resolveTemplates(opts.fetchTemplate ?? ((ident) => fetchSpdxTemplate(ident, undefined, opts.logger)));
  return config;
}

/** 既定設定の YAML テキスト */
export function readDefaultConfig(): string {
  return fs.readFileSync(DEFAULT_CONFIG_PATH, 'utf8');
}

/**
 * 既定設定を書き出す
 * @param dir 出力先ディレクトリ
 * @returns 書き出したファイルのパス
 */
export function writeDefaultConfig(dir: string = process.cwd()): string {
  const target = path.join(dir, CONFIG_FILE_NAME);
  // 書き込み失敗はパス付きで報告する
  try {
    fs.writeFileSync(target, readDefaultConfig(), 'utf8');
  } catch (e) {
    throw new ConfigError(`Unable to write to ${target}: ${describeCause(e)}`, { cause: e });
  }

  return target;
}
