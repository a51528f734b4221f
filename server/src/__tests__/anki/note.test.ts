import {
  deckListId,
  noteEnglish,
  noteJapanese,
  noteJmdictId,
  noteListId,
  noteReading,
} from '../../anki/note';

function note(fields: Record<string, string>, deckName = '500:JLPT:N5 verbs') {
  return { deckName, fields };
}

describe('note fields', () => {
  describe('noteJapanese / noteReading', () => {
    it('should split written form and reading', () => {
      const n = note({ Japanese: '食べる/たべる' });
      expect(noteJapanese(n)).toBe('食べる');
      expect(noteReading(n)).toBe('たべる');
    });

    it('should use the written form as reading when there is no slash', () => {
      const n = note({ Japanese: 'これ' });
      expect(noteJapanese(n)).toBe('これ');
      expect(noteReading(n)).toBe('これ');
    });

    it('should use the written form as reading when the reading is empty', () => {
      const n = note({ Japanese: 'これ/' });
      expect(noteReading(n)).toBe('これ');
    });

    it('should take the last part as reading', () => {
      const n = note({ Japanese: 'a/b/c' });
      expect(noteJapanese(n)).toBe('a');
      expect(noteReading(n)).toBe('c');
    });
  });

  describe('noteEnglish', () => {
    it('should return the English field or null', () => {
      expect(noteEnglish(note({ Japanese: 'x', English: 'to eat' }))).toBe('to eat');
      expect(noteEnglish(note({ Japanese: 'x' }))).toBeNull();
    });
  });

  describe('noteJmdictId', () => {
    it('should return the jmdictId field', () => {
      expect(noteJmdictId(note({ Japanese: 'x', jmdictId: '1358280' }))).toBe('1358280');
    });

    it('should treat a missing or empty field as absent', () => {
      expect(noteJmdictId(note({ Japanese: 'x' }))).toBeNull();
      expect(noteJmdictId(note({ Japanese: 'x', jmdictId: '' }))).toBeNull();
    });
  });

  describe('list ids', () => {
    it('should read the list id before the first colon', () => {
      expect(deckListId('500:JLPT:N5 verbs')).toBe('500');
      expect(noteListId(note({ Japanese: 'x' }, '600:Mine:a:b'))).toBe('600');
    });

    it('should use the whole name when there is no colon', () => {
      expect(deckListId('600')).toBe('600');
    });
  });
});
