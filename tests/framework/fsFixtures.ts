/**
 * @file テスト用の一時ディレクトリとメモリ上のファイル入出力
 * 備考: 特記事項なし
 * - 各テスト専用の一時ディレクトリを作成/削除する
 * - 判定エンジン向けには実ファイルを使わない FileIo の代替を提供する
 * - 生成するファイルは UTF-8 で保存する
 */
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { FileIo } from '../../src/licensing/types';

/**
 * 一時ディレクトリを作成してパスを返す
 * @param prefix ディレクトリ名の接頭辞
 * @returns 作成したディレクトリの絶対パス
 */
export function createTmpDir(prefix = 'copyguard-tests-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * テキストファイルを書き込む（親ディレクトリも作成）
 * @param fp ファイルパス
 * @param content 内容
 */
export function writeTextFile(fp: string, content: string): void {
  fs.mkdirSync(path.dirname(fp), { recursive: true });
  fs.writeFileSync(fp, content, { encoding: 'utf8' });
}

/** ディレクトリを再帰削除（存在しなくても成功扱い） */
export function cleanupDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** 書き込みと標準出力を記録するメモリ上の FileIo */
export type MemoryIo = FileIo & {
  readonly files: Map<string, string>;
  readonly printed: string[];
  readonly written: string[];
};

/**
 * メモリ上の FileIo を作る。未登録のパスの読み込みは ENOENT 相当で失敗する。
 * @param initial 初期ファイル
 * @returns FileIo
 */
export function createMemoryIo(initial: Record<string, string> = {}): MemoryIo {
  const files = new Map(Object.entries(initial));
  const printed: string[] = [];
  const written: string[] = [];
  return {
    files,
    printed,
    written,
    read: (p) => {
      const content = files.get(p);
      if (content === undefined) throw new Error(`ENOENT: no such file ${p}`);
      return content;
    },
    write: (p, content) => {
      files.set(p, content);
      written.push(p);
    },
    print: (content) => {
      printed.push(content);
    },
  };
}
