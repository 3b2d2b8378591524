#!/usr/bin/env -S npx tsx
/**
 * @file copyguard CLI の単一実行ポイント。設定読み込み→対象列挙→判定/更新→結果報告を行う。
 * 備考: 特記事項なし
 * - 引数解析は commander に任せ、終了コードは main の戻り値で一元管理する
 * - 例外は握り潰さず、利用者向けメッセージへ変換して標準エラーへ出す
 * - チェックモードでは更新が必要/未ライセンスのファイルがあれば 1 を返す
 * - コメンタ未設定のファイルはモードに関係なく 1 を返す
 * - 対象が指定されない場合は 10 を返す
 * - 本スクリプトは単体実行およびモジュールとしてのインポートの両方に対応する
 */
import { Command, CommanderError } from 'commander';
import { pathToFileURL } from 'node:url';
import type { Config } from '../src/config/config.ts';
import { loadConfig, writeDefaultConfig, type LoadConfigOptions } from '../src/config/load.ts';
import { ConfigNotFoundError, describeCause } from '../src/errors.ts';
import { getProjectFiles } from '../src/git/git.ts';
import { Licensure } from '../src/licensing/licensure.ts';
import type { FileIo, LicenseStats } from '../src/licensing/types.ts';
import { createLogger, levelFromVerbosity } from '../src/logger.ts';

const VERSION = '0.1.0';

/** 引数指定なしの終了コード */
export const EXIT_NO_FILES = 10;

/** 解析済みオプション */
type CliOptions = {
  inPlace: boolean;
  check: boolean;
  exclude?: string;
  project: boolean;
  generateConfig: boolean;
  verbose: number;
};

/** main が使う外部依存（テストで差し替える） */
export type CliDeps = {
  loadConfig: (opts: LoadConfigOptions) => Promise<Config>;
  projectFiles: () => string[];
  writeDefaultConfig: (dir: string) => string;
  stderr: (text: string) => void;
  cwd: string;
  io?: FileIo;
};

const defaultDeps: CliDeps = {
  loadConfig,
  projectFiles: () => getProjectFiles(),
  writeDefaultConfig,
  stderr: (text) => {
    process.stderr.write(text);
  },
  cwd: process.cwd(),
};

/**
 * commander のプログラム定義
 * @param stderr エラー出力先
 * @returns プログラム
 */
function buildProgram(stderr: (text: string) => void): Command {
  return new Command()
    .name('copyguard')
    .description('Insert, detect and refresh license headers in source files')
    .version(VERSION)
    .argument('[files...]', 'Files to license, ignored if --project is supplied')
    .option('-i, --in-place', 'Modify files in place', false)
    .option('-c, --check', 'Report files needing a header update without changing them', false)
    .option('-e, --exclude <regex>', 'A regex which will be used to determine what files to ignore.')
    .option('-p, --project', 'License the current project files as returned by git ls-files', false)
    .option('-g, --generate-config', 'Generate a default copyguard config file', false)
    .option('-v, --verbose', 'Increase log verbosity (repeatable)', (_value: string, previous: number) => previous + 1, 0)
    .exitOverride()
    .configureOutput({ writeErr: stderr });
}

/**
 * ファイル一覧を見出し付きで出力する
 * @param stderr 出力先
 * @param files ファイル一覧
 * @param message 見出し
 * @returns 1 件以上出力したら true
 */
function printFiles(stderr: (text: string) => void, files: readonly string[], message: string): boolean {
  // 空なら何も出さない
  if (files.length === 0) return false;
  stderr(`${message} ${String(files.length)}\n`);
  for (const file of files) stderr(`${file}\n`);
  return true;
}

const NEEDS_UPDATE_MESSAGE = "The following files' licenses need to be updated";
const NOT_LICENSED_MESSAGE = 'The following files were not licensed with the given config.';
const NEEDS_COMMENTER_MESSAGE = 'The following files did not have a commenter with the given config.';

/**
 * CLI 本体
 * @param argv ユーザー引数（node とスクリプトパスを除く）
 * @param overrides 差し替える依存
 * @returns 終了コード
 */
export async function main(argv: readonly string[], overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = { ...defaultDeps, ...overrides };
  const program = buildProgram(deps.stderr);

  // --help/--version と引数エラーは commander の終了コードに従う
  try {
    program.parse([...argv], { from: 'user' });
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    throw e;
  }

  const opts = program.opts<CliOptions>();
  const positional = program.args;
  const logger = createLogger(levelFromVerbosity(opts.verbose), deps.stderr);

  if (opts.generateConfig) {
    // 既定設定の書き出しのみ行って終了する
    try {
      const written = deps.writeDefaultConfig(deps.cwd);
      logger.info(`wrote ${written}`);
      return 0;
    } catch (e) {
      deps.stderr(`${describeCause(e)}\n`);
      return 1;
    }
  }

  let files: string[];
  if (opts.project) {
    // git 由来の列挙失敗は利用者へそのまま伝える
    try {
      files = deps.projectFiles();
    } catch (e) {
      deps.stderr(`${describeCause(e)}\n`);
      return 1;
    }
  } else if (positional.length > 0) {
    files = positional;
  } else {
    deps.stderr('ERROR: Must provide files to license either as arguments or via --project\n');
    return EXIT_NO_FILES;
  }

  let config: Config;
  // 設定の不在と不正を区別して案内する
  try {
    config = await deps.loadConfig({ cwd: deps.cwd, logger });
    if (opts.exclude !== undefined) config.addExclude(opts.exclude);
  } catch (e) {
    if (e instanceof ConfigNotFoundError) {
      deps.stderr('No config file found, generate one with copyguard --generate-config\n');
    } else {
      deps.stderr(`Error loading config file: ${describeCause(e)}\n`);
    }

    return 1;
  }

  if (opts.inPlace) config.changeInPlace = true;

  const licensure = new Licensure(config, {
    checkMode: opts.check,
    logger,
    ...(deps.io ? { io: deps.io } : {}),
  });

  let stats: LicenseStats;
  // I/O 失敗はバッチ全体の失敗として報告する
  try {
    stats = licensure.licenseFiles(files);
  } catch (e) {
    deps.stderr(`Failed to license files: ${describeCause(e)}\n`);
    return 1;
  }

  if (opts.check && (stats.filesNotLicensed.length > 0 || stats.filesNeedingLicenseUpdate.length > 0)) {
    printFiles(deps.stderr, stats.filesNeedingLicenseUpdate, NEEDS_UPDATE_MESSAGE);
    printFiles(deps.stderr, stats.filesNotLicensed, NOT_LICENSED_MESSAGE);
    printFiles(deps.stderr, stats.filesNeedingCommenter, NEEDS_COMMENTER_MESSAGE);
    return 1;
  }

  return printFiles(deps.stderr, stats.filesNeedingCommenter, NEEDS_COMMENTER_MESSAGE) ? 1 : 0;
}

/** このファイルが直接起動されたかの判定（ユニットテストからの import を除外） */
const isMain = (() => {
  const arg1 = process.argv[1];
  // 直接起動の判定ができない場合は実行しない
  if (typeof arg1 !== 'string') return false;
  return import.meta.url === pathToFileURL(arg1).href;
})();

// ライブラリとしての import 時は実行せず、直接起動されたときのみ CLI を起動する
if (isMain) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      // 想定外の例外も標準エラーへ出して終了コードを非0にする
      process.stderr.write(`${describeCause(e)}\n`);
      process.exitCode = 1;
    });
}
