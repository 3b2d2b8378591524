/**
 * @file git 連携のテスト
 * 備考: 特記事項なし
 * - git の実行は GitRunner の差し替えで行い、外部プロセスは起動しない
 * - ファイルの存在/シンボリックリンク判定のみ一時ディレクトリを使う
 */
import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GitError } from '../../src/errors';
import { getGitYearsForFile, getProjectFiles, type GitRunner } from '../../src/git/git';
import { cleanupDir, createTmpDir, writeTextFile } from '../framework/fsFixtures';

// 概要: コミット年の取得
describe('getGitYearsForFile', () => {
  it('reads the year field of each log line, newest first', () => {
    const calls: (readonly string[])[] = [];
    const git: GitRunner = (args) => {
      calls.push(args);
      return 'Wed May 29 04:54:58 2024 +0100\nTue Jan  3 10:00:00 2023 +0000\n';
    };

    expect(getGitYearsForFile('src/a.ts', git)).toEqual(['2024', '2023']);
    expect(calls).toEqual([['log', '--follow', '--format=%ad', '--date', 'default', 'src/a.ts']]);
  });

  it('uses the current year for files without history', () => {
    expect(getGitYearsForFile('new.ts', () => '', new Date(2030, 0, 15))).toEqual(['2030']);
  });

  it('rejects dates it cannot parse', () => {
    expect(() => getGitYearsForFile('a.ts', () => 'yesterday\n')).toThrow(GitError);
    expect(() => getGitYearsForFile('a.ts', () => 'yesterday\n')).toThrow('Unable to determine year from git date "yesterday"');
  });
});

// 概要: プロジェクトファイルの列挙
describe('getProjectFiles', () => {
  let tmp: string;

  beforeEach(() => {
    tmp = createTmpDir();
  });

  afterEach(() => {
    cleanupDir(tmp);
  });

  it('combines tracked and untracked files, skipping missing paths and symlinks', () => {
    const tracked = path.join(tmp, 'tracked.ts');
    const deleted = path.join(tmp, 'deleted.ts');
    const link = path.join(tmp, 'link.ts');
    const untracked = path.join(tmp, 'untracked.ts');
    writeTextFile(tracked, 'x\n');
    writeTextFile(untracked, 'y\n');
    fs.symlinkSync(tracked, link);

    const git: GitRunner = (args) => (args.length === 1 ? `${tracked}\n${deleted}\n${link}\n` : `${untracked}\n`);
    expect(getProjectFiles(git)).toEqual([tracked, untracked]);
  });

  it('propagates git failures', () => {
    const git: GitRunner = () => {
      throw new GitError('not a repo');
    };
    expect(() => getProjectFiles(git)).toThrow('not a repo');
  });
});
