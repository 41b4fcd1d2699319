import { z } from 'zod';

export const tagCatalogConfigSchema = z
  .object({
    parser: z
      .object({
        emit_unnamed_group: z.boolean().optional(),
        reset_on_parse: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
