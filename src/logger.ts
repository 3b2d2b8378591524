/**
 * @file 標準エラーへ出力する段階付きロガー
 * 備考: 特記事項なし
 * - 出力形式は `[copyguard] <level>: <message>` の 1 行
 * - しきい値は -v の回数で決まり、既定は warn のみ出力する
 * - 出力先は差し替え可能（テストでは配列へ収集する）
 */

/** ログレベル（数値が大きいほど詳細） */
export type LogLevel = 'warn' | 'info' | 'debug' | 'trace';

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  warn: 0,
  info: 1,
  debug: 2,
  trace: 3,
};

/** 出力先（既定は標準エラー） */
export type LogSink = (line: string) => void;

/** ロガーの公開面 */
export interface Logger {
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  trace(message: string): void;
}

/**
 * -v の回数をしきい値レベルへ変換する
 * @param verbosity -v の指定回数
 * @returns 出力対象とする最も詳細なレベル
 */
export function levelFromVerbosity(verbosity: number): LogLevel {
  // 3 回以上は trace に丸める
  if (verbosity >= 3) return 'trace';
  if (verbosity === 2) return 'debug';
  if (verbosity === 1) return 'info';
  return 'warn';
}

/**
 * ロガーを生成する
 * @param threshold 出力する最も詳細なレベル
 * @param sink 出力先
 * @returns ロガー
 */
export function createLogger(
  threshold: LogLevel = 'warn',
  sink: LogSink = (line) => {
    process.stderr.write(line);
  }
): Logger {
  const emit = (level: LogLevel, message: string): void => {
    // しきい値より詳細なレベルは捨てる
    if (LEVEL_RANK[level] > LEVEL_RANK[threshold]) return;
    sink(`[copyguard] ${level}: ${message}\n`);
  };

  return {
    warn: (m) => emit('warn', m),
    info: (m) => emit('info', m),
    debug: (m) => emit('debug', m),
    trace: (m) => emit('trace', m),
  };
}

/** 何も出力しないロガー（ライブラリ利用時の既定） */
export const silentLogger: Logger = createLogger('warn', () => undefined);
