/**
 * Renshuu API response schemas
 *
 * Only the fields renshuu-connect reads are described; everything else
 * passes through untouched. Ids arrive as numbers or strings and are
 * normalized to strings.
 */

import { z } from 'zod';

const idSchema = z.union([z.string(), z.number()]).transform(String);

const optionalIdSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined || value === '' ? null : String(value)));

export const renshuuWordSchema = z
  .object({
    id: idSchema,
    kanji_full: z.string().default(''),
    hiragana_full: z.string().default(''),
    aforms: z.array(z.object({ term: z.string() }).passthrough()).default([]),
    edict_ent: optionalIdSchema,
  })
  .passthrough();

export type RenshuuWord = z.infer<typeof renshuuWordSchema>;

export const wordSearchResponseSchema = z
  .object({
    words: z.array(z.unknown()).default([]),
  })
  .passthrough();

const scheduleListSchema = z
  .object({
    list_id: idSchema,
    title: z.string().default(''),
  })
  .passthrough();

const scheduleGroupSchema = z
  .object({
    group_title: z.string().default(''),
    lists: z.array(scheduleListSchema).default([]),
  })
  .passthrough();

const termtypeGroupSchema = z
  .object({
    termtype: z.string(),
    groups: z.array(scheduleGroupSchema).default([]),
  })
  .passthrough();

export const listsResponseSchema = z
  .object({
    termtype_groups: z.array(termtypeGroupSchema).default([]),
  })
  .passthrough();

export type ListsResponse = z.infer<typeof listsResponseSchema>;

export const listContentsResponseSchema = z
  .object({
    num_terms: z.coerce.number().optional(),
    contents: z
      .object({
        terms: z.array(z.record(z.unknown())).default([]),
        total_pg: z.coerce.number().int().positive().default(1),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

export type ListContentsResponse = z.infer<typeof listContentsResponseSchema>;

/**
 * Outcome of adding a word to a schedule
 *
 * Returned rather than thrown: "already present" failures count as success
 * for the caller.
 */
export interface AddWordResult {
  ok: boolean;
  status: number;
  error?: string;
}
