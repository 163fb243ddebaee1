/**
 * Tests for the calendar record mapper
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { parseCalendar } from '../../src/services/ics-parser';
import {
  formatInstant,
  mapCalendar,
  mapEntry,
  normalizeDescription,
  parseLocation,
} from '../../src/services/record-mapper';
import { RawCalendarEntry } from '../../src/types/index';
import { DEFAULT_TRANSFORM_CONFIG, buildTransformConfig } from '../../src/utils/config';

function entry(overrides: Partial<RawCalendarEntry> = {}): RawCalendarEntry {
  return { properties: {}, ...overrides };
}

const SEPT_8 = { date: new Date('2025-09-08T16:15:00Z'), timeZone: 'UTC' };

describe('Record Mapper', () => {
  describe('mapEntry', () => {
    it('should map a full entry into an output record', () => {
      const record = mapEntry(
        entry({
          uid: 'evt-1',
          begin: SEPT_8,
          end: { date: new Date('2025-09-08T17:15:00Z'), timeZone: 'UTC' },
          name: 'Jane Roe, Example University',
          description: 'Talk about\n\nsparse   models.',
          url: 'https://events.example.edu/talks/1',
          location: '101 - Sherrerd',
          categories: ['Seminar'],
          properties: { dtstamp: '20250901T120000Z' },
        })
      );

      expect(record).toEqual({
        guid: 'evt-1',
        startTime: '2025-09-08T12:15:00',
        endTime: '2025-09-08T13:15:00',
        urlRef: 'https://events.example.edu/talks/1',
        series: 'Seminar',
        content: 'Talk about sparse models.',
        speaker: 'Jane Roe\\, Example University',
        location: { name: 'Sherrerd', id: '', detail: '101' },
        title: '',
        cancelled: '',
        bannerImage: '',
        itemType: 'advertisement',
      });
    });

    it('should emit every mapped and placeholder key for an empty entry', () => {
      expect(mapEntry(entry())).toEqual({
        guid: '',
        startTime: '',
        endTime: '',
        urlRef: '',
        series: '',
        content: '',
        speaker: '',
        location: { name: '', id: '', detail: '' },
        title: '',
        cancelled: '',
        bannerImage: '',
        itemType: 'advertisement',
      });
    });

    it('should join sorted categories with the delimiter', () => {
      const record = mapEntry(entry({ categories: ['CatB', 'CatA'] }));

      expect(record.series).toBe('CatA,CatB');
    });

    it('should take a single tag when joining is disabled', () => {
      const config = buildTransformConfig({ join_categories: false });

      expect(mapEntry(entry({ categories: ['CatB', 'CatA'] }), config).series).toBe('CatB');
      expect(mapEntry(entry({ categories: [] }), config).series).toBe('');
    });

    it('should pass a single category string through', () => {
      expect(mapEntry(entry({ categories: 'Lecture Series' })).series).toBe('Lecture Series');
    });

    it('should use a custom delimiter', () => {
      const config = buildTransformConfig({ category_delimiter: ' | ' });

      expect(mapEntry(entry({ categories: ['b', 'a'] }), config).series).toBe('a | b');
    });

    it('should skip masked attributes', () => {
      const config = buildTransformConfig({ masked_fields: ['uid'] });
      const record = mapEntry(entry({ uid: 'evt-1' }), config);

      expect(record).not.toHaveProperty('guid');
    });

    it('should map extra properties by their lower-cased name', () => {
      const config = buildTransformConfig({ field_mappings: { status: 'cancelled', uid: 'guid' } });
      const record = mapEntry(entry({ uid: 'evt-1', properties: { status: 'CANCELLED' } }), config);

      expect(record.cancelled).toBe('CANCELLED');
      expect(record.guid).toBe('evt-1');
    });

    it('should not let placeholders overwrite mapped values', () => {
      const config = buildTransformConfig({ field_mappings: { name: 'title' }, placeholders: { title: 'TBD' } });

      expect(mapEntry(entry({ name: 'Colloquium' }), config).title).toBe('Colloquium');
      expect(mapEntry(entry(), config).title).toBe('');
    });

    it('should copy fields only when the source exists', () => {
      const config = buildTransformConfig({ copies: { summary: 'speaker', other: 'nonexistent' } });
      const record = mapEntry(entry({ name: 'John Doe' }), config);

      expect(record.summary).toBe('John Doe');
      expect(record).not.toHaveProperty('other');
    });
  });

  describe('normalizeDescription', () => {
    it('should escape commas and semicolons when enabled', () => {
      const config = buildTransformConfig({ escape_description: true });

      expect(normalizeDescription('a, b; c \\, d', config)).toBe('a\\, b\\; c \\, d');
    });

    it('should fold newlines to a literal escape in literal mode', () => {
      const config = buildTransformConfig({ newline_mode: 'literal' });

      expect(normalizeDescription('Line one\r\n\r\nLine  two', config)).toBe('Line one\\nLine two');
    });

    it('should leave text untouched when collapsing is disabled', () => {
      const config = buildTransformConfig({ collapse_whitespace: false });

      expect(normalizeDescription('Line one\n  Line two', config)).toBe('Line one\n  Line two');
    });
  });

  describe('formatInstant', () => {
    it('should render in the target zone', () => {
      expect(formatInstant(SEPT_8, DEFAULT_TRANSFORM_CONFIG)).toBe('2025-09-08T12:15:00');
    });

    it('should fall back to the instant zone when the target zone is invalid', () => {
      const config = buildTransformConfig({ target_timezone: 'Not/AZone' });

      expect(formatInstant(SEPT_8, config)).toBe('2025-09-08T16:15:00');
    });

    it('should fall back to ISO when no zone works', () => {
      const config = buildTransformConfig({ target_timezone: 'Not/AZone' });

      expect(formatInstant({ date: SEPT_8.date, timeZone: 'Also/Invalid' }, config)).toBe(
        '2025-09-08T16:15:00.000Z'
      );
    });
  });

  describe('parseLocation', () => {
    it('should split detail and name on the first hyphen', () => {
      expect(parseLocation('101 - Sherrerd')).toEqual({ name: 'Sherrerd', id: '', detail: '101' });
      expect(parseLocation('Room 5 - Hall - East')).toEqual({ name: 'Hall - East', id: '', detail: 'Room 5' });
    });

    it('should treat a string without a hyphen as the detail', () => {
      expect(parseLocation('Auditorium')).toEqual({ name: '', id: '', detail: 'Auditorium' });
    });

    it('should return empty fields for missing input', () => {
      expect(parseLocation(undefined)).toEqual({ name: '', id: '', detail: '' });
      expect(parseLocation('   ')).toEqual({ name: '', id: '', detail: '' });
    });
  });

  describe('mapCalendar', () => {
    it('should sort by start with undated entries first', () => {
      const records = mapCalendar([
        entry({ uid: 'late', begin: { date: new Date('2025-10-01T15:00:00Z'), timeZone: 'UTC' } }),
        entry({ uid: 'undated-1' }),
        entry({ uid: 'early', begin: SEPT_8 }),
        entry({ uid: 'undated-2' }),
      ]);

      expect(records.map((record) => record.guid)).toEqual(['undated-1', 'undated-2', 'early', 'late']);
    });

    it('should map a parsed feed', () => {
      const text = readFileSync(join(__dirname, '..', 'fixtures', 'sample.ics'), 'utf-8');
      const records = mapCalendar(parseCalendar(text));

      expect(records).toEqual([
        {
          guid: 'evt-100@example.edu',
          startTime: '2025-09-08T12:15:00',
          endTime: '2025-09-08T13:15:00',
          urlRef: 'https://events.example.edu/talks/first',
          series: 'Colloquium,Statistics',
          content: 'A long description that is folded across two lines.',
          speaker: 'John Doe',
          location: { name: 'Sherrerd', id: '', detail: '101' },
          title: '',
          cancelled: '',
          bannerImage: '',
          itemType: 'advertisement',
        },
        {
          guid: 'evt-200@example.edu',
          startTime: '2025-09-15T15:30:00',
          endTime: '2025-09-15T16:30:00',
          urlRef: 'https://events.example.edu/talks/second',
          series: 'Seminar',
          content: 'Second talk of the term. Refreshments served.',
          speaker: 'Jane Roe\\, Example University',
          location: { name: 'Fine Hall', id: '', detail: '214' },
          title: '',
          cancelled: '',
          bannerImage: '',
          itemType: 'advertisement',
        },
      ]);
    });
  });
});
