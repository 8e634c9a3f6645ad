import { describe, it, expect } from 'vitest';
import {
  cleanText,
  splitSentences,
  takeSentences,
} from '../server/services/defect-detection/normalizer';

describe('Text Normalizer', () => {
  describe('cleanText', () => {
    it('should collapse runs of whitespace into single spaces', () => {
      expect(cleanText('The  wall\tis   damp.')).toBe('The wall is damp.');
    });

    it('should drop page markers, bare numbers and short lines', () => {
      const text = 'Page 1 of 3\nThe roof is sagging.\n12\nOK.\nWater drips.';
      expect(cleanText(text)).toBe('The roof is sagging. Water drips.');
    });

    it('should drop date, confidentiality and copyright lines', () => {
      const text = [
        'Date: 12/03/2024',
        'CONFIDENTIAL SURVEY',
        '© 2024 Example Surveyors',
        'Copyright notice applies',
        'Rust was found on the railings.',
      ].join('\n');
      expect(cleanText(text)).toBe('Rust was found on the railings.');
    });

    it('should keep survey prose that mentions confidentiality or copyright', () => {
      const text = [
        'Our confidential inspection found rising damp in the cellar.',
        'The roof is sound.',
        'Confidential: the surveyor noted that the render on the rear elevation has cracked badly above the kitchen window.',
      ].join('\n');
      expect(cleanText(text)).toBe(
        'Our confidential inspection found rising damp in the cellar. The roof is sound. Confidential: the surveyor noted that the render on the rear elevation has cracked badly above the kitchen window.'
      );
    });

    it('should join lines that continue a sentence', () => {
      expect(cleanText('Rising damp was\r\nfound in the cellar.')).toBe('Rising damp was found in the cellar.');
    });

    it('should return an empty string for empty input', () => {
      expect(cleanText('')).toBe('');
      expect(cleanText('   \n  \n')).toBe('');
    });
  });

  describe('splitSentences', () => {
    it('should split on terminal punctuation followed by whitespace', () => {
      const sentences = splitSentences('The roof is sagging. Water drips! Is it safe? Yes').toArray();

      expect(sentences).toEqual([
        { index: 0, offset: 0, text: 'The roof is sagging.', normalized: 'the roof is sagging.' },
        { index: 1, offset: 21, text: 'Water drips!', normalized: 'water drips!' },
        { index: 2, offset: 34, text: 'Is it safe?', normalized: 'is it safe?' },
        { index: 3, offset: 46, text: 'Yes', normalized: 'yes' },
      ]);
    });

    it('should not split decimal numbers', () => {
      const texts = splitSentences('The crack is 3.5 mm wide. It is new.').toArray().map(s => s.text);
      expect(texts).toEqual(['The crack is 3.5 mm wide.', 'It is new.']);
    });

    it('should expose offsets into the cleaned text', () => {
      const sequence = splitSentences('Page 2\nDamp   patches.  Mould spores present.');
      for (const sentence of sequence) {
        expect(sequence.cleanedText.slice(sentence.offset, sentence.offset + sentence.text.length)).toBe(sentence.text);
      }
    });

    it('should yield nothing for empty text', () => {
      expect(splitSentences('').toArray()).toEqual([]);
    });

    it('should restart from the first sentence on every iteration', () => {
      const sequence = splitSentences('One crack. Two leaks.');
      expect(Array.from(sequence)).toEqual(Array.from(sequence));
      expect(sequence.toArray()).toHaveLength(2);
    });
  });

  describe('takeSentences', () => {
    const sequence = splitSentences('First. Second. Third.');

    it('should stop after the limit', () => {
      expect(Array.from(takeSentences(sequence, 2)).map(s => s.text)).toEqual(['First.', 'Second.']);
    });

    it('should yield everything when the limit exceeds the sentence count', () => {
      expect(Array.from(takeSentences(sequence, 10))).toHaveLength(3);
    });

    it('should yield nothing for a non-positive limit', () => {
      expect(Array.from(takeSentences(sequence, 0))).toEqual([]);
    });
  });
});
