/**
 * Minimal reader for Anki search queries as sent by `findNotes`
 *
 * Understands `deck:<name>`, `Japanese:<form>[/<reading>]` and
 * `jmdictId:<id>` terms, each optionally double-quoted. Anything else
 * is ignored.
 */

export interface FindNotesCriteria {
  deck?: string;
  japanese?: string;
  reading?: string;
  jmdictId?: string;
}

const TOKEN_PATTERN = /"((?:[^"\\]|\\.)*)"|(\S+)/g;

function unescape(value: string): string {
  return value.replace(/\\(.)/g, '$1');
}

export function tokenizeQuery(query: string): string[] {
  const tokens: string[] = [];
  for (const match of query.matchAll(TOKEN_PATTERN)) {
    tokens.push(match[1] ?? match[2]);
  }
  return tokens;
}

export function parseFindNotesQuery(query: string): FindNotesCriteria {
  const criteria: FindNotesCriteria = {};

  for (const token of tokenizeQuery(query)) {
    const separator = token.indexOf(':');
    if (separator <= 0) {
      continue;
    }

    const field = token.slice(0, separator).toLowerCase();
    const value = unescape(token.slice(separator + 1));
    if (value === '') {
      continue;
    }

    switch (field) {
      case 'deck':
        criteria.deck = value;
        break;
      case 'japanese': {
        const parts = value.split('/');
        criteria.japanese = parts[0];
        if (parts.length > 1 && parts[parts.length - 1] !== '') {
          criteria.reading = parts[parts.length - 1];
        }
        break;
      }
      case 'jmdictid':
        criteria.jmdictId = value;
        break;
      default:
        break;
    }
  }

  return criteria;
}

/**
 * True when the criteria name a word, not only a deck
 */
export function hasWordCriteria(criteria: FindNotesCriteria): boolean {
  return criteria.japanese !== undefined || criteria.jmdictId !== undefined;
}
