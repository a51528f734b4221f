/**
 * Request validation for the AnkiConnect endpoint
 */

import { z } from 'zod';
import type { AnkiRequest, MultiActionEntry, SingleRequest } from '../../../shared/src';
import { RequestValidationError, UnsupportedActionError } from '../errors';

const noteSchema = z
  .object({
    deckName: z.string(),
    fields: z.record(z.string()).refine((fields) => typeof fields.Japanese === 'string', {
      message: 'note is missing the Japanese field',
    }),
  })
  .passthrough();

const notesParamsSchema = z.object({ notes: z.array(noteSchema) });

const base = {
  version: z.literal(2),
  key: z.string(),
};

export const singleRequestSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('version'), ...base }),
  z.object({ action: z.literal('deckNames'), ...base }),
  z.object({ action: z.literal('modelNames'), ...base }),
  z.object({ action: z.literal('modelFieldNames'), ...base }),
  z.object({ action: z.literal('storeMediaFile'), ...base }),
  z.object({ action: z.literal('addNote'), ...base, params: z.object({ note: noteSchema }) }),
  z.object({ action: z.literal('canAddNotes'), ...base, params: notesParamsSchema }),
  z.object({ action: z.literal('canAddNotesWithErrorDetail'), ...base, params: notesParamsSchema }),
  z.object({ action: z.literal('findNotes'), ...base, params: z.object({ query: z.string() }) }),
]);

const multiRequestSchema = z.object({
  action: z.literal('multi'),
  ...base,
  params: z.object({
    actions: z.array(
      z.object({
        action: z.string(),
        params: z.unknown().optional(),
      })
    ),
  }),
});

const SINGLE_ACTIONS: readonly string[] = singleRequestSchema.options.map((option) => option.shape.action.value);

export const SUPPORTED_ACTIONS: readonly string[] = [...SINGLE_ACTIONS, 'multi'];

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

function readAction(body: unknown): string {
  if (typeof body !== 'object' || body === null || !('action' in body)) {
    throw new RequestValidationError(['action: Required']);
  }
  if (typeof body.action !== 'string') {
    throw new RequestValidationError(['action: Expected string']);
  }
  return body.action;
}

/**
 * Validate a request body
 *
 * @throws {UnsupportedActionError} For actions outside SUPPORTED_ACTIONS
 * @throws {RequestValidationError} For malformed requests
 */
export function parseAnkiRequest(body: unknown): AnkiRequest {
  const action = readAction(body);

  if (action === 'multi') {
    const parsed = multiRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new RequestValidationError(formatIssues(parsed.error), { action });
    }
    return parsed.data;
  }

  return parseSingle(action, body);
}

/**
 * Rebuild a `multi` entry as a standalone request carrying the outer key
 *
 * Nested `multi` entries are rejected.
 */
export function parseMultiEntry(entry: MultiActionEntry, key: string): SingleRequest {
  const body: Record<string, unknown> = { action: entry.action, version: 2, key };
  if (entry.params !== undefined) {
    body.params = entry.params;
  }
  return parseSingle(entry.action, body);
}

function parseSingle(action: string, body: unknown): SingleRequest {
  if (!SINGLE_ACTIONS.includes(action)) {
    throw new UnsupportedActionError(action);
  }

  const parsed = singleRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new RequestValidationError(formatIssues(parsed.error), { action });
  }
  return parsed.data;
}
