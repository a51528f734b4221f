import { RequestValidationError, UnsupportedActionError } from '../../errors';
import { SUPPORTED_ACTIONS, parseAnkiRequest, parseMultiEntry } from '../../anki/schemas';

const note = { deckName: '500:JLPT:N5 verbs', fields: { Japanese: '食べる/たべる', English: 'to eat' } };

describe('AnkiConnect request validation', () => {
  it('should list every supported action', () => {
    expect([...SUPPORTED_ACTIONS].sort()).toEqual([
      'addNote',
      'canAddNotes',
      'canAddNotesWithErrorDetail',
      'deckNames',
      'findNotes',
      'modelFieldNames',
      'modelNames',
      'multi',
      'storeMediaFile',
      'version',
    ]);
  });

  it('should accept a parameterless action', () => {
    expect(parseAnkiRequest({ action: 'version', version: 2, key: 'test-key' })).toEqual({
      action: 'version',
      version: 2,
      key: 'test-key',
    });
  });

  it('should drop params of actions that take none', () => {
    const request = parseAnkiRequest({
      action: 'storeMediaFile',
      version: 2,
      key: 'test-key',
      params: { filename: 'a.mp3', data: 'AAAA' },
    });

    expect(request).toEqual({ action: 'storeMediaFile', version: 2, key: 'test-key' });
  });

  it('should keep extra note properties', () => {
    const request = parseAnkiRequest({
      action: 'addNote',
      version: 2,
      key: 'test-key',
      params: { note: { ...note, modelName: 'with jmdictId', tags: ['yomitan'] } },
    });

    expect(request).toMatchObject({
      action: 'addNote',
      params: { note: { deckName: '500:JLPT:N5 verbs', modelName: 'with jmdictId' } },
    });
  });

  it('should reject bodies without an action', () => {
    expect(() => parseAnkiRequest({ version: 2 })).toThrow(RequestValidationError);
    expect(() => parseAnkiRequest('version')).toThrow('Invalid request: action: Required');
  });

  it('should reject unknown actions', () => {
    expect(() => parseAnkiRequest({ action: 'guiBrowse', version: 2, key: 'k' })).toThrow(
      UnsupportedActionError
    );
    expect(() => parseAnkiRequest({ action: 'guiBrowse', version: 2, key: 'k' })).toThrow(
      'Unsupported action: guiBrowse'
    );
  });

  it('should require protocol version 2', () => {
    expect(() => parseAnkiRequest({ action: 'version', version: 6, key: 'k' })).toThrow(
      'Invalid request: version: Invalid literal value, expected 2'
    );
  });

  it('should require the key', () => {
    expect(() => parseAnkiRequest({ action: 'version', version: 2 })).toThrow(
      'Invalid request: key: Required'
    );
  });

  it('should require the Japanese field on notes', () => {
    expect(() =>
      parseAnkiRequest({
        action: 'canAddNotes',
        version: 2,
        key: 'k',
        params: { notes: [{ deckName: '500', fields: { English: 'to eat' } }] },
      })
    ).toThrow('Invalid request: params.notes.0.fields: note is missing the Japanese field');
  });

  it('should accept multi requests with arbitrary entries', () => {
    const request = parseAnkiRequest({
      action: 'multi',
      version: 2,
      key: 'k',
      params: { actions: [{ action: 'version' }, { action: 'nope', params: 1 }] },
    });

    expect(request).toEqual({
      action: 'multi',
      version: 2,
      key: 'k',
      params: { actions: [{ action: 'version' }, { action: 'nope', params: 1 }] },
    });
  });

  describe('parseMultiEntry', () => {
    it('should carry over the outer key', () => {
      expect(parseMultiEntry({ action: 'findNotes', params: { query: 'Japanese:橋' } }, 'k')).toEqual({
        action: 'findNotes',
        version: 2,
        key: 'k',
        params: { query: 'Japanese:橋' },
      });
    });

    it('should reject nested multi', () => {
      expect(() => parseMultiEntry({ action: 'multi', params: { actions: [] } }, 'k')).toThrow(
        'Unsupported action: multi'
      );
    });

    it('should reject entries missing their params', () => {
      expect(() => parseMultiEntry({ action: 'addNote' }, 'k')).toThrow('Invalid request: params: Required');
    });
  });
});
