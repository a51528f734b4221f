/**
 * Tests for AnkiConnect action dispatch, including `multi`
 */

import { openDatabase, CacheDatabase } from '../../db/database';
import { CacheRepository } from '../../db/CacheRepository';
import { ActionDispatcher } from '../../anki/ActionDispatcher';
import { RequestValidationError, RenshuuApiError, UnsupportedActionError } from '../../errors';
import { RenshuuService } from '../../services/RenshuuService';
import { FakeRenshuu, TEST_API_KEY, seedDictionary } from '../helpers/fakeRenshuu';

const key = TEST_API_KEY;

function addNoteParams(japanese: string, deckName: string) {
  return { note: { deckName, fields: { Japanese: japanese, English: 'placeholder' } } };
}

describe('ActionDispatcher', () => {
  let db: CacheDatabase;
  let fake: FakeRenshuu;
  let dispatcher: ActionDispatcher;
  let keysSeen: string[];

  beforeEach(() => {
    db = openDatabase(':memory:');
    const cache = new CacheRepository(db);
    fake = new FakeRenshuu();
    seedDictionary(fake);
    keysSeen = [];
    dispatcher = new ActionDispatcher((apiKey) => {
      keysSeen.push(apiKey);
      return new RenshuuService(fake.createApi(apiKey), cache);
    });
  });

  afterEach(() => {
    db.close();
  });

  describe('single actions', () => {
    it('should answer version with 2', async () => {
      await expect(dispatcher.handle({ action: 'version', version: 2, key })).resolves.toBe(2);
    });

    it('should answer the fixed model names and fields', async () => {
      await expect(dispatcher.handle({ action: 'modelNames', version: 2, key })).resolves.toEqual([
        'Default',
        'with jmdictId',
      ]);
      await expect(dispatcher.handle({ action: 'modelFieldNames', version: 2, key })).resolves.toEqual([
        'Japanese',
        'English',
        'jmdictId',
      ]);
    });

    it('should accept and ignore media files', async () => {
      await expect(
        dispatcher.handle({
          action: 'storeMediaFile',
          version: 2,
          key,
          params: { filename: 'audio.mp3', data: 'AAAA' },
        })
      ).resolves.toBe('');
    });

    it('should list schedules as deck names', async () => {
      await expect(dispatcher.handle({ action: 'deckNames', version: 2, key })).resolves.toEqual([
        '500:JLPT:N5 verbs',
        '600:Mine:Sentence mining',
      ]);
    });

    it('should build the service with the request key', async () => {
      await dispatcher.handle({ action: 'version', version: 2, key: 'other-key' });

      expect(keysSeen).toEqual(['other-key']);
    });

    it('should add notes', async () => {
      await expect(
        dispatcher.handle({ action: 'addNote', version: 2, key, params: addNoteParams('飲む/のむ', '600') })
      ).resolves.toBe(1);
      expect(fake.lists[1].termIds).toEqual([102]);
    });

    it('should answer canAddNotes per note', async () => {
      const notes = [addNoteParams('飲む', '600').note, addNoteParams('見る', '500').note];

      await expect(
        dispatcher.handle({ action: 'canAddNotes', version: 2, key, params: { notes } })
      ).resolves.toEqual([true, true]);
    });

    it('should answer canAddNotesWithErrorDetail per note', async () => {
      await dispatcher.handle({ action: 'addNote', version: 2, key, params: addNoteParams('飲む/のむ', '600') });
      const notes = [addNoteParams('飲む/のむ', '600').note, addNoteParams('飲む/のむ', '500').note];

      await expect(
        dispatcher.handle({ action: 'canAddNotesWithErrorDetail', version: 2, key, params: { notes } })
      ).resolves.toEqual([
        { canAdd: false, error: 'cannot create note because it is a duplicate' },
        { canAdd: true },
      ]);
    });

    it('should find cached notes', async () => {
      await dispatcher.handle({ action: 'addNote', version: 2, key, params: addNoteParams('飲む/のむ', '600') });

      await expect(
        dispatcher.handle({ action: 'findNotes', version: 2, key, params: { query: '"deck:600" "Japanese:飲む"' } })
      ).resolves.toEqual([102]);
    });

    it('should reject unsupported actions', async () => {
      await expect(dispatcher.handle({ action: 'guiBrowse', version: 2, key })).rejects.toBeInstanceOf(
        UnsupportedActionError
      );
    });

    it('should reject malformed requests', async () => {
      await expect(dispatcher.handle({ action: 'findNotes', version: 2, key })).rejects.toBeInstanceOf(
        RequestValidationError
      );
    });

    it('should propagate Renshuu failures', async () => {
      await expect(
        dispatcher.handle({ action: 'deckNames', version: 2, key: 'wrong-key' })
      ).rejects.toBeInstanceOf(RenshuuApiError);
    });
  });

  describe('multi', () => {
    it('should run entries in order with the outer key', async () => {
      const result = await dispatcher.handle({
        action: 'multi',
        version: 2,
        key,
        params: {
          actions: [
            { action: 'version' },
            { action: 'addNote', params: addNoteParams('橋/はし', '600') },
            { action: 'findNotes', params: { query: 'Japanese:橋/はし' } },
          ],
        },
      });

      expect(result).toEqual([2, 1, [105]]);
      expect(keysSeen).toEqual([key]);
    });

    it('should put an error envelope in place of a failing entry', async () => {
      const result = await dispatcher.handle({
        action: 'multi',
        version: 2,
        key,
        params: {
          actions: [
            { action: 'guiBrowse' },
            { action: 'findNotes' },
            { action: 'multi', params: { actions: [] } },
            { action: 'modelNames' },
          ],
        },
      });

      expect(result).toEqual([
        { result: null, error: 'Unsupported action: guiBrowse' },
        { result: null, error: 'Invalid request: params: Required' },
        { result: null, error: 'Unsupported action: multi' },
        ['Default', 'with jmdictId'],
      ]);
    });

    it('should report Renshuu failures per entry', async () => {
      const result = await dispatcher.handle({
        action: 'multi',
        version: 2,
        key: 'wrong-key',
        params: { actions: [{ action: 'deckNames' }, { action: 'version' }] },
      });

      expect(result).toEqual([
        { result: null, error: 'Renshuu rejected the API key: Invalid API key' },
        2,
      ]);
    });

    it('should answer an empty list for no entries', async () => {
      await expect(
        dispatcher.handle({ action: 'multi', version: 2, key, params: { actions: [] } })
      ).resolves.toEqual([]);
    });
  });
});
