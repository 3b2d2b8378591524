/**
 * @file ライセンスヘッダの判定と更新エンジン
 * 備考: 特記事項なし
 * - 判定は「設定なし → コメンタなし → 付与済み → 年違い(単年/年範囲、それぞれ末尾空白許容あり) → replaces → 新規付与」の順で最初の一致を採る
 * - 置換は最初の一致箇所のみをリテラルのヘッダで差し替え、それ以外は原文を保つ
 * - 新規付与では先頭の shebang 行をヘッダより前へ残す
 * - ファイル単位で読み込み→判定→適用を同期的に行い、I/O 失敗で即座に停止する
 * - UTF-8 として読めないファイルは読み込み失敗として扱い、書き換えない
 * - チェックモードでは書き込まず集計のみ行う
 */
import * as fs from 'node:fs';
import type { Comment } from '../comments/types.ts';
import { LicensingError } from '../errors.ts';
import { silentLogger, type Logger } from '../logger.ts';
import { replaceFirstLiteral } from '../text/regex.ts';
import type { Template } from '../template/template.ts';
import type { FileIo, LicenseStats, LicenseStatus, LicensingConfig } from './types.ts';

/** ファイル先頭の shebang 行 */
const SHEBANG = /^#![^\n]*\n/;

/** UTF-8 として不正なバイト列は置換せず失敗させる（BOM は内容として保持） */
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** 実ファイルシステムと標準出力を使う既定の入出力 */
export const nodeFileIo: FileIo = {
  read: (p) => utf8.decode(fs.readFileSync(p)),
  write: (p, content) => fs.writeFileSync(p, content, 'utf8'),
  print: (content) => {
    process.stdout.write(`${content}\n`);
  },
};

/** 空の集計を生成する */
export function emptyStats(): LicenseStats {
  return { filesNotLicensed: [], filesNeedingLicenseUpdate: [], filesNeedingCommenter: [] };
}

/**
 * ヘッダを先頭へ付与する（shebang があればその直後）
 * @param header コメント化済みヘッダ
 * @param content ファイル内容
 * @returns 付与後の内容
 */
export function addHeader(header: string, content: string): string {
  const m = SHEBANG.exec(content);
  // shebang は位置 0 にある場合のみ扱う
  if (!m) return header + content;
  return m[0] + header + content.slice(m[0].length);
}

/**
 * replaces パターンを順に試し、最初の一致をヘッダで置換する
 * @param replaces 旧ヘッダのパターン
 * @param content ファイル内容
 * @param header 新しいヘッダ
 * @returns 置換後の内容（どれも一致しなければ undefined）
 */
export function getReplacesReplacement(
  replaces: readonly RegExp[],
  content: string,
  header: string
): string | undefined {
  for (const old of replaces) {
    const replaced = replaceFirstLiteral(content, old, header);
    if (replaced !== undefined) return replaced;
  }

  return undefined;
}

export type LicensureOptions = {
  checkMode?: boolean;
  logger?: Logger;
  io?: FileIo;
};

export class Licensure {
  private readonly config: LicensingConfig;
  private readonly checkMode: boolean;
  private readonly logger: Logger;
  private readonly io: FileIo;
  private stats: LicenseStats = emptyStats();

  constructor(config: LicensingConfig, opts: LicensureOptions = {}) {
    this.config = config;
    this.checkMode = opts.checkMode ?? false;
    this.logger = opts.logger ?? silentLogger;
    this.io = opts.io ?? nodeFileIo;
  }

  /**
   * ファイル群を順に判定し、必要なものを更新する
   * @param files 対象ファイルパス（指定順に処理する）
   * @returns 今回のバッチの集計
   * @throws LicensingError 読み書きに失敗した場合（以降のファイルは処理しない）
   */
  licenseFiles(files: readonly string[]): LicenseStats {
    this.stats = emptyStats();

    for (const file of files) {
      // 除外パターンに一致するファイルは触れない
      if (this.config.excludes.isMatch(file)) {
        this.logger.info(`skipping ${file} because it is excluded.`);
        continue;
      }

      this.logger.trace(`working on file: ${file}`);
      const content = this.readFile(file);
      const status = this.classify(file, content);
      this.record(file, status);

      if (status.kind === 'needsUpdate') this.handleUpdate(file, status.content);
    }

    return this.stats;
  }

  /**
   * 1 ファイルを分類する（副作用なし）
   * @param file ファイルパス（設定ルックアップに使う）
   * @param content ファイル内容
   * @returns 判定結果
   */
  classify(file: string, content: string): LicenseStatus {
    const templ = this.config.licenses.getTemplate(file);
    if (!templ) {
      this.logger.info(`skipping ${file} because no license config matched.`);
      return { kind: 'noConfigMatched' };
    }

    const resolved = this.config.comments.getCommenter(file);
    if (!resolved) {
      this.logger.info(`skipping ${file} because no comment config matched.`);
      return { kind: 'noCommenterMatched' };
    }

    const { commenter, columns } = resolved;
    const header = commenter.comment(templ.render(), columns);
    // 完全一致、または末尾空白を除いた一致で付与済みとみなす
    if (content.includes(header) || content.includes(header.trimEnd())) {
      this.logger.info(`${file} already licensed`);
      return { kind: 'alreadyLicensed' };
    }

    const outdated = this.getOutdatedReplacement(templ, commenter, columns, content, header);
    if (outdated !== undefined) {
      this.logger.info(`${file} licensed, but year is outdated`);
      return { kind: 'needsUpdate', content: outdated };
    }

    const replaces = this.config.licenses.getReplaces(file);
    if (replaces) {
      const replaced = getReplacesReplacement(replaces, content, header);
      if (replaced !== undefined) {
        this.logger.info(`${file} licensed, but license is outdated`);
        return { kind: 'needsUpdate', content: replaced };
      }
    }

    this.logger.debug(`${file} has no license header`);
    return { kind: 'needsUpdate', content: addHeader(header, content) };
  }

  /**
   * 年可変パターン（単年の厳密 → 単年の末尾空白許容 → 年範囲の厳密 → 年範囲の末尾空白許容）で既存ヘッダを探して置換する
   * @param templ テンプレート
   * @param commenter コメンタ
   * @param columns 折り返し桁
   * @param content ファイル内容
   * @param header 新しいヘッダ
   * @returns 置換後の内容（一致しなければ undefined）
   */
  getOutdatedReplacement(
    templ: Template,
    commenter: Comment,
    columns: number | undefined,
    content: string,
    header: string
  ): string | undefined {
    for (const outdated of templ.outdatedLicensePatterns(commenter, columns)) {
      this.logger.trace(`outdated pattern: ${outdated.source}`);
      const replaced = replaceFirstLiteral(content, outdated, header);
      if (replaced !== undefined) return replaced;
    }

    return undefined;
  }

  private record(file: string, status: LicenseStatus): void {
    switch (status.kind) {
      case 'needsUpdate':
        this.stats.filesNeedingLicenseUpdate.push(file);
        break;
      case 'noConfigMatched':
        this.stats.filesNotLicensed.push(file);
        break;
      case 'noCommenterMatched':
        this.stats.filesNotLicensed.push(file);
        this.stats.filesNeedingCommenter.push(file);
        break;
      case 'alreadyLicensed':
        break;
    }
  }

  private readFile(file: string): string {
    // 読み込み失敗はパス付きで呼び出し側へ伝える
    try {
      return this.io.read(file);
    } catch (e) {
      throw new LicensingError(`failed to read file ${file}`, e);
    }
  }

  private handleUpdate(file: string, content: string): void {
    // チェックモードでは何も書き出さない
    if (this.checkMode) return;

    if (!this.config.changeInPlace) {
      this.io.print(content);
      return;
    }

    // 書き込み失敗はパス付きで呼び出し側へ伝える
    try {
      this.io.write(file, content);
    } catch (e) {
      throw new LicensingError(`failed to write to file ${file}`, e);
    }
  }
}
