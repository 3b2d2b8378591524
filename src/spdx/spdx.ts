/**
 * @file SPDX ライセンス情報からのテンプレート取得
 * 備考: 特記事項なし
 * - https://spdx.org/licenses/<ident>.json を取得する
 * - standardLicenseHeader があればそれを、無ければ警告して licenseText を使う
 * - 400 は不正な識別子、それ以外の非 200 はステータス付きで SpdxError とする
 * - fetch は差し替え可能（テストはネットワークへ出ない）
 */
import { z } from 'zod';
import { SpdxError, describeCause } from '../errors.ts';
import { silentLogger, type Logger } from '../logger.ts';

/** SPDX ライセンス JSON のうち利用する項目 */
const spdxLicenseInfoSchema = z.object({
  licenseText: z.string(),
  standardLicenseHeader: z.string().nullish(),
});

/** テンプレート取得関数 */
export type TemplateFetcher = (ident: string) => Promise<string>;

/** fetch 互換の関数 */
export type FetchLike = (url: string) => Promise<Pick<Response, 'status' | 'json'>>;

const SPDX_BASE_URL = 'https://spdx.org/licenses';
const HTTP_OK = 200;
const HTTP_BAD_REQUEST = 400;

/**
 * ライセンス識別子の JSON URL
 * @param ident SPDX 識別子
 * @returns URL
 */
export function spdxUrl(ident: string): string {
  return `${SPDX_BASE_URL}/${encodeURIComponent(ident)}.json`;
}

/**
 * SPDX からテンプレート文字列を取得する
 * @param ident SPDX 識別子
 * @param fetchImpl fetch 実装
 * @param logger 全文へ切り替えたことの警告先
 * @returns ヘッダテンプレート
 */
export async function fetchSpdxTemplate(
  ident: string,
  fetchImpl: FetchLike = fetch,
  logger: Logger = silentLogger
): Promise<string> {
  let response: Awaited<ReturnType<FetchLike>>;
  // 通信エラーは識別子付きで報告する
  try {
    response = await fetchImpl(spdxUrl(ident));
  } catch (e) {
    throw new SpdxError(`Failed to fetch license template from SPDX: ${describeCause(e)}`, { cause: e });
  }

  if (response.status === HTTP_BAD_REQUEST) {
    throw new SpdxError(
      `${ident} does not appear to be a valid SPDX identifier, go to https://spdx.org/licenses/ to view a list of valid identifiers`
    );
  }

  if (response.status !== HTTP_OK) {
    throw new SpdxError(`Failed to fetch license template from SPDX for ${ident}: ${String(response.status)}`);
  }

  let body: unknown;
  // JSON として読めない応答は不正とする
  try {
    body = await response.json();
  } catch (e) {
    throw new SpdxError(`Failed to deserialize SPDX JSON: ${describeCause(e)}`, { cause: e });
  }

  const parsed = spdxLicenseInfoSchema.safeParse(body);
  if (!parsed.success) {
    throw new SpdxError(`Failed to deserialize SPDX JSON: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }

  const { standardLicenseHeader, licenseText } = parsed.data;
  if (standardLicenseHeader) return standardLicenseHeader;
  // 空のヘッダは未定義として全文へ切り替える
  logger.warn(`${ident} has no standard license header, using the full license text as the template`);
  return licenseText;
}
