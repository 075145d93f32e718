/**
 * Filename Parser Service Tests
 */

import { describe, it, expect } from 'vitest';
import {
  FilenameParser,
  cleanTitle,
  normalizeDelimiters,
  parseChapter,
} from '../filename-parser.service.js';
import { LEVELS, createCapturingLogger } from './__mocks__/logger.mock.js';

describe('Filename Parser Service', () => {
  const parser = new FilenameParser();

  describe('normalizeDelimiters', () => {
    it('should turn underscores and dots into spaces', () => {
      expect(normalizeDelimiters('Tom_Strong_023')).toBe('Tom Strong 023');
      expect(normalizeDelimiters('Vol.1.Ch.5')).toBe('Vol.1 Ch.5');
    });

    it('should space out long dashes', () => {
      expect(normalizeDelimiters('Series—Arc')).toBe('Series - Arc');
    });
  });

  describe('cleanTitle', () => {
    it('should trim separators', () => {
      expect(cleanTitle(' - Accel  World - ')).toBe('Accel World');
    });
  });

  describe('parseChapter', () => {
    it('should find chapter and issue tokens', () => {
      expect(parseChapter('Naruto Chapter 10.5')).toBe('10.5');
      expect(parseChapter('Batman #12')).toBe('12');
      expect(parseChapter('Saga Issue 5')).toBe('5');
      expect(parseChapter('Batman 001 (2016)')).toBe('1');
    });

    it('should not mistake a year for a chapter', () => {
      expect(parseChapter('Batman 1989')).toBe('0');
      expect(parseChapter('One Piece')).toBe('0');
    });
  });

  describe('parseFilename', () => {
    it('should parse a manga volume', () => {
      const record = parser.parseFilename('/lib/Accel World/Accel World v01.cbz', '/lib', 'manga');

      expect(record).toEqual({
        series: 'Accel World',
        localizedSeries: '',
        seriesSort: '',
        volumes: '1',
        chapters: '0',
        title: 'Accel World v01',
        edition: '',
        format: 'archive',
        isSpecial: false,
        fullFilePath: '/lib/Accel World/Accel World v01.cbz',
        filename: 'Accel World v01.cbz',
        folderPath: '',
        comicInfo: null,
      });
    });

    it('should parse a comic issue with a year', () => {
      const record = parser.parseFilename('/lib/Batman/Batman 001 (2016).cbz', '/lib', 'comic');

      expect(record).toMatchObject({ series: 'Batman', volumes: '0', chapters: '1' });
    });

    it('should parse volume and chapter together', () => {
      const record = parser.parseFilename('/lib/Naruto/Naruto_v02_ch010.cbz', '/lib', 'manga');

      expect(record).toMatchObject({ series: 'Naruto', volumes: '2', chapters: '10' });
    });

    it('should flag specials and reset their designators', () => {
      const record = parser.parseFilename('/lib/Accel World/Accel World SP01.cbz', '/lib', 'manga');

      expect(record).toMatchObject({ series: 'Accel World', isSpecial: true, volumes: '0', chapters: '0' });
    });

    it('should keep numbers in book titles', () => {
      const record = parser.parseFilename('/lib/Books/Mistborn 2.epub', '/lib', 'book');

      expect(record).toMatchObject({ series: 'Mistborn 2', volumes: '0', chapters: '0', format: 'epub' });
    });

    it('should keep a trailing year in the series', () => {
      const record = parser.parseFilename('/lib/Batman/Batman 1989.cbz', '/lib', 'comic');

      expect(record).toMatchObject({ series: 'Batman 1989', chapters: '0' });
    });

    it('should extract the edition', () => {
      const record = parser.parseFilename('/lib/Berserk/Berserk v01 (Deluxe Edition).cbz', '/lib', 'manga');

      expect(record).toMatchObject({ series: 'Berserk', volumes: '1', edition: 'Deluxe Edition' });
    });

    it('should fall back to the folder name', () => {
      const record = parser.parseFilename('/lib/One Piece/001.cbz', '/lib', 'manga');

      expect(record).toMatchObject({ series: 'One Piece', chapters: '1' });
    });

    it('should name images after their folder', () => {
      const record = parser.parseFilename('/lib/Accel World/page 001.jpg', '/lib', 'image');

      expect(record).toMatchObject({ series: 'Accel World', format: 'image' });
    });

    it('should return null when no series can be found', () => {
      expect(parser.parseFilename('/lib/page 001.jpg', '/lib', 'image')).toBeNull();
    });

    it('should return null for covers and unsupported files', () => {
      expect(parser.parseFilename('/lib/Accel World/cover.jpg', '/lib', 'manga')).toBeNull();
      expect(parser.parseFilename('/lib/Accel World/notes.txt', '/lib', 'manga')).toBeNull();
    });
  });

  describe('configured patterns', () => {
    it('should try configured patterns first', () => {
      const custom = new FilenameParser({
        volumePatterns: ['Tome (?<volume>\\d+)'],
        seriesPatterns: ['^(?<series>.+?) - Tome'],
      });

      const record = custom.parseFilename('/lib/Asterix/Asterix - Tome 05.cbz', '/lib', 'comic');

      expect(record).toMatchObject({ series: 'Asterix', volumes: '5' });
    });

    it('should skip invalid patterns with a warning', () => {
      const capture = createCapturingLogger();

      const custom = new FilenameParser({ volumePatterns: ['(unclosed'], logger: capture.logger });

      expect(capture.messages(LEVELS.warn)).toEqual(['Ignoring invalid parser pattern']);
      expect(custom.parseVolume('Accel World v03')).toBe('3');
    });
  });

  describe('adapter', () => {
    it('should parse through the adapter interface without metadata', async () => {
      const record = await parser.parse('/lib/Accel World/Accel World v01.cbz', '/lib', 'manga');

      expect(record?.series).toBe('Accel World');
      expect(await parser.getComicInfo()).toBeNull();
    });
  });
});
