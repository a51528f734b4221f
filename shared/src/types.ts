/**
 * AnkiConnect Protocol Types for renshuu-connect
 *
 * Request and response shapes exchanged between AnkiConnect clients
 * (dictionary popups, browser extensions) and the server.
 *
 * Requests use a discriminated union on the 'action' field, mirroring
 * the AnkiConnect version 2 protocol.
 */

// ============================================================================
// NOTES
// ============================================================================

/**
 * Note as sent by AnkiConnect clients
 *
 * Only `deckName` and `fields` are read. Extra properties such as
 * `modelName`, `tags` or `options` are accepted and ignored.
 *
 * @example
 * {
 *   deckName: '12345:JLPT:N5 verbs',
 *   modelName: 'with jmdictId',
 *   fields: { Japanese: '食べる/たべる', English: 'to eat', jmdictId: '1358280' }
 * }
 */
export interface AnkiNote {
  deckName: string;
  fields: Record<string, string>;
}

// ============================================================================
// REQUESTS (Client → Server)
// ============================================================================

/** AnkiConnect protocol version this server speaks */
export type ProtocolVersion = 2;

interface BaseRequest {
  version: ProtocolVersion;
  /** Renshuu API key of the caller */
  key: string;
}

export interface VersionRequest extends BaseRequest {
  action: 'version';
}

export interface DeckNamesRequest extends BaseRequest {
  action: 'deckNames';
}

export interface ModelNamesRequest extends BaseRequest {
  action: 'modelNames';
}

export interface ModelFieldNamesRequest extends BaseRequest {
  action: 'modelFieldNames';
  params?: unknown;
}

export interface StoreMediaFileRequest extends BaseRequest {
  action: 'storeMediaFile';
  params?: unknown;
}

export interface AddNoteRequest extends BaseRequest {
  action: 'addNote';
  params: { note: AnkiNote };
}

export interface CanAddNotesRequest extends BaseRequest {
  action: 'canAddNotes';
  params: { notes: AnkiNote[] };
}

export interface CanAddNotesWithErrorDetailRequest extends BaseRequest {
  action: 'canAddNotesWithErrorDetail';
  params: { notes: AnkiNote[] };
}

export interface FindNotesRequest extends BaseRequest {
  action: 'findNotes';
  params: { query: string };
}

/**
 * One entry of a `multi` request
 *
 * Carries no key or version: both are taken from the enclosing request.
 */
export interface MultiActionEntry {
  action: string;
  params?: unknown;
}

export interface MultiRequest extends BaseRequest {
  action: 'multi';
  params: { actions: MultiActionEntry[] };
}

/**
 * Every request that can be dispatched on its own
 */
export type SingleRequest =
  | VersionRequest
  | DeckNamesRequest
  | ModelNamesRequest
  | ModelFieldNamesRequest
  | StoreMediaFileRequest
  | AddNoteRequest
  | CanAddNotesRequest
  | CanAddNotesWithErrorDetailRequest
  | FindNotesRequest;

export type AnkiRequest = SingleRequest | MultiRequest;

// ============================================================================
// RESPONSES (Server → Client)
// ============================================================================

/**
 * Error envelope returned in place of a result
 *
 * @example
 * { result: null, error: 'Renshuu API error: Invalid API key' }
 */
export interface ErrorEnvelope {
  result: null;
  error: string;
}

/**
 * Per-note answer of `canAddNotesWithErrorDetail`
 *
 * `error` is omitted when the note can be added.
 */
export interface CanAddNoteDetail {
  canAdd: boolean;
  error?: string;
}

/**
 * Result of a single action: the bare value on success,
 * or an error envelope
 */
export type ActionResult =
  | number
  | string
  | null
  | boolean[]
  | number[]
  | string[]
  | CanAddNoteDetail[]
  | ErrorEnvelope;

/**
 * Result of any request, including `multi`
 */
export type AnkiResponse = ActionResult | ActionResult[];

/**
 * Build an error envelope
 */
export function errorEnvelope(error: string): ErrorEnvelope {
  return { result: null, error };
}
