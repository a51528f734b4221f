import type { AnkiNote } from '../../../shared/src';

/**
 * Readers for the fields of an AnkiConnect note
 *
 * The `Japanese` field holds `<written form>/<reading>`; a missing or empty
 * reading part means the written form is itself the reading.
 */

function japaneseParts(note: AnkiNote): string[] {
  return (note.fields.Japanese ?? '').split('/');
}

export function noteJapanese(note: AnkiNote): string {
  return japaneseParts(note)[0];
}

export function noteReading(note: AnkiNote): string {
  const parts = japaneseParts(note);
  const last = parts[parts.length - 1];
  return last !== '' ? last : parts[0];
}

export function noteEnglish(note: AnkiNote): string | null {
  return note.fields.English ?? null;
}

export function noteJmdictId(note: AnkiNote): string | null {
  const value = note.fields.jmdictId;
  return value ? value : null;
}

/**
 * Renshuu schedule id encoded in front of the deck name
 * ("<list_id>:<group>:<title>")
 */
export function deckListId(deckName: string): string {
  return deckName.split(':')[0];
}

export function noteListId(note: AnkiNote): string {
  return deckListId(note.deckName);
}
