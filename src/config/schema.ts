/**
 * @file 設定ファイル（.copyguard.yml）のスキーマ
 * 備考: 特記事項なし
 * - YAML の生の形を zod で検証し、既定値を補う
 * - キー名は YAML 側のスネークケースをそのまま受ける
 * - 年は数値/文字列のどちらで書かれても文字列へ揃える
 * - 中身がコメントだけのセクション（null）は空配列として扱う
 */
import { z } from 'zod';

const yearSchema = z.union([z.string(), z.number().int()]).transform((v) => String(v));

const stringOrListSchema = z.union([z.string(), z.array(z.string())]);

/** null（中身がコメントのみのセクション）を空配列へ寄せる */
function listOf<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((v) => v ?? []);
}

export const holderSchema = z.object({
  name: z.string(),
  email: z.string().optional(),
});

export const licenseEntrySchema = z
  .object({
    files: stringOrListSchema,
    ident: z.string(),
    authors: listOf(holderSchema),
    year: yearSchema.optional(),
    end_year: yearSchema.optional(),
    start_year: yearSchema.optional(),
    use_dynamic_year_ranges: z.boolean().default(false),
    template: z.string().optional(),
    auto_template: z.boolean().default(false),
    replaces: z.array(z.string()).optional(),
    unwrap_text: z.boolean().default(true),
  })
  .refine((l) => l.template !== undefined || l.auto_template, {
    message: 'auto_template not enabled and no template provided, please add a template option to the license definition',
    path: ['template'],
  });

const trailingLinesSchema = z.number().int().nonnegative().default(0);

export const commenterSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('line'),
    comment_char: z.string(),
    trailing_lines: trailingLinesSchema,
  }),
  z.object({
    type: z.literal('block'),
    start_block_char: z.string(),
    end_block_char: z.string(),
    per_line_char: z.string().optional(),
    trailing_lines: trailingLinesSchema,
  }),
]);

export const commentEntrySchema = z
  .object({
    extension: stringOrListSchema.optional(),
    extensions: stringOrListSchema.optional(),
    files: z.string().optional(),
    columns: z.number().int().positive().optional(),
    commenter: commenterSchema,
  })
  .refine((c) => c.extension !== undefined || c.extensions !== undefined || c.files !== undefined, {
    message: 'one of extension, extensions or files is required',
  });

export const configFileSchema = z.object({
  change_in_place: z.boolean().default(false),
  excludes: listOf(z.string()),
  licenses: listOf(licenseEntrySchema),
  comments: listOf(commentEntrySchema),
});

export type LicenseEntry = z.infer<typeof licenseEntrySchema>;
export type CommenterEntry = z.infer<typeof commenterSchema>;
export type CommentEntry = z.infer<typeof commentEntrySchema>;
export type ConfigFile = z.infer<typeof configFileSchema>;
