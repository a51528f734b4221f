/**
 * Renshuu Service
 *
 * Turns AnkiConnect note operations into Renshuu schedule operations,
 * answering from the local cache whenever it can to save API calls.
 */

import type { Logger } from 'winston';
import {
  ANKI_CONSTANTS,
  AnkiNote,
  CanAddNoteDetail,
  ErrorEnvelope,
  RENSHUU_CONSTANTS,
  errorEnvelope,
} from '../../../shared/src';
import { CacheRepository } from '../db/CacheRepository';
import { RenshuuApiError } from '../errors';
import { deckListId, noteJapanese, noteJmdictId, noteListId, noteReading } from '../anki/note';
import { hasWordCriteria, parseFindNotesQuery } from '../anki/query';
import { RenshuuApi } from '../renshuu/RenshuuApi';
import { ListContentsResponse, RenshuuWord, renshuuWordSchema } from '../renshuu/types';
import { logger as rootLogger } from '../utils/logger';
import { OPERATIONS, createLogContext } from '../utils/logger-standards';

export type RenshuuClient = Pick<RenshuuApi, 'getLists' | 'searchWords' | 'getListContents' | 'addWordToList'>;

/**
 * Japanese forms a dictionary entry can be written as
 */
export function japaneseForms(word: RenshuuWord): string[] {
  if (word.kanji_full === '') {
    return [word.hiragana_full];
  }
  return [...word.aforms.map((form) => form.term), word.kanji_full];
}

/**
 * Schedule contents mix vocabulary with kanji, grammar and sentences;
 * only vocabulary entries carry exactly these keys
 */
export function isVocabTerm(term: Record<string, unknown>): boolean {
  return (
    'id' in term &&
    'kanji_full' in term &&
    'hiragana_full' in term &&
    !('kanji' in term) &&
    !('title_english' in term) &&
    !('japanese' in term)
  );
}

function isAuthFailure(error: RenshuuApiError): boolean {
  return error.httpStatus === 401 || error.httpStatus === 403;
}

export class RenshuuService {
  private readonly api: RenshuuClient;
  private readonly cache: CacheRepository;
  private readonly logger: Logger;

  constructor(api: RenshuuClient, cache: CacheRepository, logger: Logger = rootLogger) {
    this.api = api;
    this.cache = cache;
    this.logger = logger;
  }

  /**
   * Vocabulary schedules as "<list_id>:<group_title>:<title>"
   */
  async getSchedules(): Promise<string[]> {
    const response = await this.api.getLists();

    const vocab = response.termtype_groups.find(
      (group) => group.termtype === RENSHUU_CONSTANTS.VOCAB_TERMTYPE
    );
    if (!vocab) {
      return [];
    }

    return vocab.groups.flatMap((group) =>
      group.lists.map((list) => `${list.list_id}:${group.group_title}:${list.title}`)
    );
  }

  /**
   * Renshuu id of the word a note describes: cache first, then search
   */
  async lookupWord(note: AnkiNote): Promise<string | null> {
    const cached = this.lookupWordCacheOnly(note);
    if (cached !== null) {
      return cached;
    }

    const japanese = noteJapanese(note);
    const reading = noteReading(note);
    const jmdictId = noteJmdictId(note);

    let words: RenshuuWord[];
    try {
      words = await this.api.searchWords(japanese);
    } catch (error) {
      if (error instanceof RenshuuApiError && !isAuthFailure(error)) {
        this.logger.warn('Word search failed', createLogContext(OPERATIONS.WORD_LOOKUP, {
          japanese,
          error: error.message,
        }));
        return null;
      }
      throw error;
    }

    if (words.length === 0) {
      return null;
    }

    this.cacheWords(words);

    if (jmdictId) {
      const byDictionary = words.find((word) => word.edict_ent === jmdictId);
      if (byDictionary) {
        return byDictionary.id;
      }
    }

    const byForm = words.find(
      (word) => word.hiragana_full === reading && japaneseForms(word).includes(japanese)
    );
    return byForm ? byForm.id : null;
  }

  /**
   * Cache-only lookup: by jmdict id, then by (japanese, reading)
   */
  lookupWordCacheOnly(note: AnkiNote): string | null {
    const jmdictId = noteJmdictId(note);
    if (jmdictId) {
      const word = this.cache.findWordByJmdictId(jmdictId);
      if (word) {
        return word.renshuuId;
      }
    }

    const word = this.cache.findWordByForm(noteJapanese(note), noteReading(note));
    return word ? word.renshuuId : null;
  }

  /**
   * Add the note's word to the schedule named by its deck
   *
   * @returns 1 on success (also when already scheduled), null when no
   * word matched, or the Renshuu error
   */
  async addNote(note: AnkiNote): Promise<1 | null | ErrorEnvelope> {
    const termId = await this.lookupWord(note);
    if (termId === null) {
      this.logger.warn('Could not find word for note', { japanese: noteJapanese(note) });
      return null;
    }

    const listId = noteListId(note);
    this.logger.debug('Adding note to list', { listId, termId });

    if (!this.cache.isListCached(listId)) {
      await this.syncList(listId);
    }

    if (this.cache.hasMembership(listId, termId)) {
      this.logger.debug('Word already in list', { listId, termId });
      return 1;
    }

    const result = await this.api.addWordToList(termId, listId);
    if (!result.ok && result.error !== RENSHUU_CONSTANTS.ALREADY_IN_SCHEDULE_ERROR) {
      this.logger.warn('Renshuu refused to add word', { listId, termId, status: result.status, error: result.error });
      return errorEnvelope(result.error ?? `HTTP ${result.status}`);
    }

    this.cache.addMembership(listId, termId);
    return 1;
  }

  /**
   * Always true: checking would cost one search per note
   */
  canAddNote(_note: AnkiNote): boolean {
    return true;
  }

  /**
   * Duplicate check against the cache only
   */
  canAddNoteWithErrorDetail(note: AnkiNote): CanAddNoteDetail {
    const termId = this.lookupWordCacheOnly(note);
    if (termId !== null && this.cache.hasMembership(noteListId(note), termId)) {
      return { canAdd: false, error: ANKI_CONSTANTS.DUPLICATE_NOTE_ERROR };
    }
    return { canAdd: true };
  }

  /**
   * Cached words matching an Anki search query, as numeric note ids
   */
  findNotes(query: string): number[] {
    const criteria = parseFindNotesQuery(query);
    if (!hasWordCriteria(criteria)) {
      return [];
    }

    const words = this.cache.findWords({
      japanese: criteria.japanese,
      reading: criteria.reading,
      jmdictId: criteria.jmdictId,
      listId: criteria.deck === undefined ? undefined : deckListId(criteria.deck),
    });

    return words
      .map((word) => Number(word.renshuuId))
      .filter((id) => Number.isSafeInteger(id));
  }

  /**
   * Page through a schedule and cache its vocabulary and memberships
   *
   * An API error stops paging; what was fetched so far stays cached.
   */
  async syncList(listId: string): Promise<void> {
    this.logger.info('Fetching and caching list contents', createLogContext(OPERATIONS.LIST_SYNC, { listId }));

    let page = 1;
    let totalPages = 1;
    let termCount: number | undefined;

    for (;;) {
      let response: ListContentsResponse;
      try {
        response = await this.api.getListContents(listId, page);
      } catch (error) {
        if (error instanceof RenshuuApiError) {
          this.logger.error('Error fetching list page', createLogContext(OPERATIONS.LIST_SYNC, {
            listId,
            page,
            error: error.message,
          }));
          break;
        }
        throw error;
      }

      if (page === 1) {
        termCount = response.num_terms;
        totalPages = response.contents.total_pg;
      }

      const terms = response.contents.terms;
      this.cache.transaction(() => {
        for (const term of terms) {
          if (!isVocabTerm(term)) {
            continue;
          }
          const parsed = renshuuWordSchema.safeParse(term);
          if (parsed.success) {
            this.cacheWord(parsed.data);
            this.cache.addMembership(listId, parsed.data.id);
          }
        }
      });

      if (page >= totalPages) {
        break;
      }
      page++;
    }

    this.logger.info('Finished caching list contents', createLogContext(OPERATIONS.LIST_SYNC, {
      listId,
      pages: page,
      terms: termCount,
    }));
  }

  private cacheWords(words: RenshuuWord[]): void {
    this.cache.transaction(() => {
      for (const word of words) {
        this.cacheWord(word);
      }
    });
  }

  private cacheWord(word: RenshuuWord): void {
    this.cache.upsertWord({
      renshuuId: word.id,
      japanese: word.kanji_full !== '' ? word.kanji_full : word.hiragana_full,
      reading: word.hiragana_full,
      jmdictId: word.edict_ent,
    });
  }
}
