/**
 * @file git 連携（プロジェクトファイル列挙とコミット年の取得）
 * 備考: 特記事項なし
 * - git は同期的に起動し、起動失敗や非 0 終了は GitError とする
 * - ls-files の結果から存在しないパスとシンボリックリンクを除く
 * - コミット年は `--date=default` 形式の 5 番目のフィールドから取る（新しい順）
 */
import { spawnSync } from 'node:child_process';
import * as fs from 'node:fs';
import { GitError } from '../errors.ts';

/** git の実行関数（テストで差し替える） */
export type GitRunner = (args: readonly string[]) => string;

/**
 * git を起動して標準出力を返す
 * @param args git の引数
 * @returns 標準出力
 */
export const runGit: GitRunner = (args) => {
  const res = spawnSync('git', [...args], { encoding: 'utf8' });
  // 起動自体の失敗（git が無い等）
  if (res.error) {
    throw new GitError(`Failed to run git ${args[0] ?? ''}. Make sure you're in a git repo.`, { cause: res.error });
  }

  if (res.status !== 0) {
    throw new GitError(`git ${args.join(' ')} exited with code ${String(res.status ?? -1)}: ${res.stderr.trim()}`);
  }

  return res.stdout;
};

/**
 * 出力を非空行の配列へ分割する
 * @param out git の標準出力
 * @returns 行配列
 */
function nonEmptyLines(out: string): string[] {
  return out
    .split(/\r?\n/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * 通常ファイルとして存在するか（シンボリックリンクは除外）
 * @param p パス
 * @returns 対象とすべきなら true
 */
function isRegularPath(p: string): boolean {
  // 取得後に削除されたパスは lstat で失敗する
  try {
    return !fs.lstatSync(p).isSymbolicLink();
  } catch {
    // 未コミットの削除ファイルは対象外
    return false;
  }
}

/**
 * 追跡中と未追跡（.gitignore 対象外）のファイルを列挙する
 * @param git git 実行関数
 * @returns ファイルパス一覧
 */
export function getProjectFiles(git: GitRunner = runGit): string[] {
  const tracked = nonEmptyLines(git(['ls-files']));
  const untracked = nonEmptyLines(git(['ls-files', '--others', '--exclude-standard']));
  return [...tracked, ...untracked].filter(isRegularPath);
}

/**
 * ファイルのコミット年を新しい順に返す。履歴が無ければ現在年のみ。
 * @param filename 対象ファイル
 * @param git git 実行関数
 * @param now 現在時刻
 * @returns 年の配列（新しい順）
 */
export function getGitYearsForFile(filename: string, git: GitRunner = runGit, now: Date = new Date()): string[] {
  const dates = nonEmptyLines(git(['log', '--follow', '--format=%ad', '--date', 'default', filename]));
  const years = dates.map((date) => {
    // 例: "Wed May 29 04:54:58 2024 +0100"
    const year = date.split(/\s+/)[4];
    if (year === undefined || !/^[0-9]{4}$/.test(year)) {
      throw new GitError(`Unable to determine year from git date ${JSON.stringify(date)}`);
    }

    return year;
  });

  return years.length > 0 ? years : [String(now.getFullYear())];
}
