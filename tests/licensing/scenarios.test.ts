/**
 * @file 判定エンジンの代表的な入出力例
 * 備考: 特記事項なし
 * - 設定層を介さず LicensingConfig を直接組み立てる
 * - 年違い（末尾改行なし）、replaces、コメンタ不在の 3 例
 * - 桁折り返し/ブロックコメントを通した年の更新
 */
import { describe, expect, it } from 'vitest';
import { BlockComment } from '../../src/comments/block-comment';
import { LineComment } from '../../src/comments/line-comment';
import type { Commenter, ResolvedCommenter } from '../../src/comments/types';
import { Licensure } from '../../src/licensing/licensure';
import type { LicensingConfig } from '../../src/licensing/types';
import { Template } from '../../src/template/template';
import { createMemoryIo } from '../framework/fsFixtures';

const TEMPLATE = new Template('License [year]\n\ntext', {
  ident: 'MIT',
  authors: [],
  endYear: '2024',
  unwrapText: true,
});

/**
 * 全ファイルに同じテンプレートを当てる設定を作る
 * @param commenters 拡張子ごとのコメンタ
 * @param replaces 旧ヘッダのパターン
 * @param template 適用するテンプレート
 * @returns エンジン向け設定
 */
function configFor(
  commenters: Record<string, ResolvedCommenter>,
  replaces?: RegExp[],
  template: Template = TEMPLATE
): LicensingConfig {
  return {
    changeInPlace: false,
    excludes: { isMatch: () => false },
    licenses: { getTemplate: () => template, getReplaces: () => replaces },
    comments: { getCommenter: (p) => commenters[p.split('.').pop() ?? ''] },
  };
}

// 概要: 代表例
describe('licensing scenarios', () => {
  it('refreshes a header that lacks its final newline', () => {
    const licensure = new Licensure(configFor({ py: { commenter: new LineComment('#') } }));
    expect(licensure.classify('a.py', '# License 2020\n#\n# text')).toEqual({
      kind: 'needsUpdate',
      content: '# License 2024\n#\n# text\n',
    });
  });

  it('swaps a legacy header in the middle of the file', () => {
    const licensure = new Licensure(
      configFor({ rs: { commenter: new LineComment('//') } }, [/(\/\/ *)?foo \(C\) .* another thing\n?/])
    );
    expect(licensure.classify('a.rs', 'BEFORE// foo (C) fill fill fill another thing\nAFTER')).toEqual({
      kind: 'needsUpdate',
      content: 'BEFORE// License 2024\n//\n// text\nAFTER',
    });
  });

  it('leaves files without a commenter untouched', () => {
    const io = createMemoryIo({ 'main.c': 'int main(void) { return 0; }\n' });
    const stats = new Licensure(configFor({}), { io }).licenseFiles(['main.c']);

    expect(stats.filesNotLicensed).toEqual(['main.c']);
    expect(stats.filesNeedingCommenter).toEqual(['main.c']);
    expect(io.printed).toEqual([]);
    expect(io.files.get('main.c')).toBe('int main(void) { return 0; }\n');
  });
});

// 概要: 折り返し/ブロックコメントを通した年の更新
describe('refreshing wrapped headers', () => {
  const LONG = 'Copyright [year] The Example Project Authors. All rights reserved.';
  const at = (endYear: string, startYear?: string): Template =>
    new Template(LONG, { ident: 'MIT', authors: [], endYear, startYear, unwrapText: false });

  const cases: readonly (readonly [string, Commenter, number])[] = [
    ['// line comments at 20 columns', new LineComment('//'), 20],
    ['/* */ blocks with per-line markers at 30 columns', new BlockComment('/*\n', '*/', { perLineChar: '*' }), 30],
    ['bare <!-- --> blocks at 30 columns', new BlockComment('<!--\n', '-->'), 30],
  ];

  for (const [name, commenter, columns] of cases) {
    it(`replaces a 2020 header with the 2024 one for ${name}`, () => {
      const licensure = new Licensure(configFor({ src: { commenter, columns } }, undefined, at('2024')));
      const old = commenter.comment(at('2020').render(), columns);
      const header = commenter.comment(at('2024').render(), columns);

      expect(licensure.classify('main.src', `${old}body\n`)).toEqual({ kind: 'needsUpdate', content: `${header}body\n` });
    });
  }

  it('replaces a wrapped year range instead of adding a second header', () => {
    const ranged = new Template('Copyright [year] Some Author Name', {
      ident: 'MIT',
      authors: [],
      startYear: '2020',
      endYear: '2024',
      unwrapText: false,
    });
    const licensure = new Licensure(configFor({ py: { commenter: new LineComment('#'), columns: 20 } }, undefined, ranged));

    expect(licensure.classify('a.py', '# Copyright 2020,\n# 2023 Some Author\n# Name\nbody\n')).toEqual({
      kind: 'needsUpdate',
      content: '# Copyright 2020,\n# 2024 Some Author\n# Name\nbody\n',
    });
  });
});
