/**
 * @file copyguard の公開 API
 */
export { BlockComment } from './comments/block-comment.ts';
export { LineComment } from './comments/line-comment.ts';
export type { Comment, Commenter, ResolvedCommenter } from './comments/types.ts';
export { Config, parseConfig } from './config/config.ts';
export { getFiletype } from './config/comment-config.ts';
export { CONFIG_FILE_NAME, findConfigFile, loadConfig, readDefaultConfig, writeDefaultConfig } from './config/load.ts';
export {
  ConfigError,
  ConfigNotFoundError,
  CopyguardError,
  GitError,
  LicensingError,
  PatternError,
  SpdxError,
} from './errors.ts';
export { getGitYearsForFile, getProjectFiles } from './git/git.ts';
export { Licensure, addHeader } from './licensing/licensure.ts';
export type { LicenseStats, LicenseStatus, LicensingConfig } from './licensing/types.ts';
export { createLogger, levelFromVerbosity } from './logger.ts';
export { fetchSpdxTemplate } from './spdx/spdx.ts';
export type { Context, CopyrightHolder } from './template/context.ts';
export { Template } from './template/template.ts';
