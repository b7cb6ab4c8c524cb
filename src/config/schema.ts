import { z } from 'zod';

// A bare directory name: no separators, not "." or "..".
const dirName = z
  .string()
  .min(1)
  .max(100)
  .regex(/^(?!\.{1,2}$)[^/\\]+$/, 'Must be a single directory name');

// Front-matter values are written unquoted.
const frontMatterToken = z
  .string()
  .max(50)
  .regex(/^[\w-]+$/, 'Must contain only letters, digits, "_" or "-"');

export const digestConfigSchema = z
  .object({
    output: z
      .object({
        candidates: z.array(dirName).max(10).optional(),
        fallback_dir: dirName.optional(),
      })
      .strict()
      .optional(),

    front_matter: z
      .object({
        layout: frontMatterToken.optional(),
        tags: z.array(frontMatterToken).max(20).optional(),
      })
      .strict()
      .optional(),

    tldr_max_chars: z.number().int().min(1).max(2000).optional(),
  })
  .strict();
