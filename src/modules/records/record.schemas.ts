/**
 * src/modules/records/record.schemas.ts
 *
 * WHY:
 * - Request shape validation for the records endpoints.
 *
 * RULES:
 * - Fields arrive as raw form strings. Trimming, "required" checks and the
 *   password split belong to the normalizer, so its messages stay exact.
 * - Length caps are enforced here so the text columns stay bounded.
 */

import { z } from 'zod';
import { MAX_CARD_ID_LENGTH, MAX_PASSWORD_LENGTH } from './record.types';
import { splitPasswords } from './helpers/password-list';

export const createRecordSchema = z.object({
  cardId: z
    .string()
    .default('')
    .refine((v) => v.trim().length <= MAX_CARD_ID_LENGTH, {
      message: `card id must be at most ${MAX_CARD_ID_LENGTH} characters`,
    }),
  unit: z.string().max(50).default(''),
  passwords: z
    .string()
    .max(2000)
    .default('')
    .refine((v) => splitPasswords(v).every((p) => p.length <= MAX_PASSWORD_LENGTH), {
      message: `each password must be at most ${MAX_PASSWORD_LENGTH} characters`,
    }),
});

export type CreateRecordInput = z.infer<typeof createRecordSchema>;

export const listRecordsQuerySchema = z.object({
  unit: z.string().max(50).optional(),
});

export type ListRecordsQuery = z.infer<typeof listRecordsQuerySchema>;

export const recordIdParamsSchema = z.object({
  id: z.string().uuid(),
});
