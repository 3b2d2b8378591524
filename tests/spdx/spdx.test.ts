/**
 * @file SPDX テンプレート取得のテスト（fetch は差し替え）
 */
import { describe, expect, it } from 'vitest';
import { SpdxError } from '../../src/errors';
import { createLogger } from '../../src/logger';
import { fetchSpdxTemplate, spdxUrl, type FetchLike } from '../../src/spdx/spdx';

/**
 * 固定応答を返す fetch を作る
 * @param status ステータス
 * @param body JSON 本文
 * @param urls 要求 URL の記録先
 * @returns fetch 互換関数
 */
function respond(status: number, body: unknown, urls: string[] = []): FetchLike {
  return async (url) => {
    urls.push(url);
    return { status, json: async () => body };
  };
}

// 概要: SPDX からのテンプレート取得
describe('fetchSpdxTemplate', () => {
  it('requests the license JSON by identifier', async () => {
    const urls: string[] = [];
    await fetchSpdxTemplate('MIT', respond(200, { licenseText: 'full' }, urls));
    expect(urls).toEqual(['https://spdx.org/licenses/MIT.json']);
    expect(spdxUrl('Apache-2.0')).toBe('https://spdx.org/licenses/Apache-2.0.json');
  });

  it('prefers the standard license header', async () => {
    const body = { licenseText: 'full', standardLicenseHeader: 'header' };
    await expect(fetchSpdxTemplate('MIT', respond(200, body))).resolves.toBe('header');
  });

  it('warns when falling back to the full license text', async () => {
    const lines: string[] = [];
    const logger = createLogger('warn', (line) => lines.push(line));
    await fetchSpdxTemplate('MIT', respond(200, { licenseText: 'full' }), logger);
    expect(lines).toEqual(['[copyguard] warn: MIT has no standard license header, using the full license text as the template\n']);
  });

  it('stays quiet when the header is present', async () => {
    const lines: string[] = [];
    const logger = createLogger('warn', (line) => lines.push(line));
    await fetchSpdxTemplate('MIT', respond(200, { licenseText: 'full', standardLicenseHeader: 'header' }), logger);
    expect(lines).toEqual([]);
  });

  it('falls back to the license text when the header is missing or empty', async () => {
    await expect(fetchSpdxTemplate('MIT', respond(200, { licenseText: 'full', standardLicenseHeader: '' }))).resolves.toBe('full');
    await expect(fetchSpdxTemplate('MIT', respond(200, { licenseText: 'full', standardLicenseHeader: null }))).resolves.toBe('full');
  });

  it('explains an unknown identifier', async () => {
    await expect(fetchSpdxTemplate('NOPE', respond(400, {}))).rejects.toThrow(
      'NOPE does not appear to be a valid SPDX identifier, go to https://spdx.org/licenses/ to view a list of valid identifiers'
    );
  });

  it('reports other HTTP failures with the status', async () => {
    await expect(fetchSpdxTemplate('MIT', respond(503, {}))).rejects.toThrow(
      'Failed to fetch license template from SPDX for MIT: 503'
    );
  });

  it('wraps network failures', async () => {
    const offline: FetchLike = async () => {
      throw new Error('offline');
    };
    await expect(fetchSpdxTemplate('MIT', offline)).rejects.toThrow(SpdxError);
    await expect(fetchSpdxTemplate('MIT', offline)).rejects.toThrow('Failed to fetch license template from SPDX: offline');
  });

  it('rejects bodies without license text', async () => {
    await expect(fetchSpdxTemplate('MIT', respond(200, { name: 'MIT' }))).rejects.toThrow(/^Failed to deserialize SPDX JSON: /);
  });

  it('rejects bodies that are not JSON', async () => {
    const broken: FetchLike = async () => ({
      status: 200,
      json: async () => {
        throw new SyntaxError('Unexpected token');
      },
    });
    await expect(fetchSpdxTemplate('MIT', broken)).rejects.toThrow('Failed to deserialize SPDX JSON: Unexpected token');
  });
});
