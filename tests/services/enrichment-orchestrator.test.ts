/**
 * Tests for the enrichment orchestrator
 */

import {
  enrichContent,
  enrichRawDetails,
  enrichRawExtracts,
  enrichTitles,
  PageFetcher,
  SectionExtractor,
} from '../../src/services/enrichment-orchestrator';
import { EnricherError, ErrorCode, OutputRecord, Result } from '../../src/types/index';

function record(fields: Record<string, string> = {}): OutputRecord {
  return { location: { name: '', id: '', detail: '' }, ...fields };
}

function pageFetcher(pages: Record<string, string>) {
  return jest.fn<Promise<Result<string>>, Parameters<PageFetcher>>(async (url) => {
    const html = pages[url];
    if (html === undefined) {
      return {
        success: false,
        error: new EnricherError(`Page not found: ${url}`, ErrorCode.HTTP_NOT_FOUND, { url }, false),
      };
    }
    return { success: true, data: html };
  });
}

const URL_A = 'https://events.example.edu/talks/a';
const URL_B = 'https://events.example.edu/talks/b';

const SUBTITLE_PAGE = '<html><body><div class="event-subtitle">\n  Sparse\n  graphs </div></body></html>';
const OTHER_SUBTITLE_PAGE = '<div class="event-subtitle">Dense graphs</div>';
const DETAILS_PAGE =
  '<div class="events-detail-main"><h2>Abstract</h2><p>We study X.</p><h2>Bio</h2><p>Prof. Y.</p></div>';

describe('Enrichment Orchestrator', () => {
  describe('enrichTitles', () => {
    it('should fill blank titles and fetch each URL once', async () => {
      const fetchPage = pageFetcher({ [URL_A]: SUBTITLE_PAGE, [URL_B]: OTHER_SUBTITLE_PAGE });
      const records = [
        record({ urlRef: URL_A, title: '' }),
        record({ urlRef: URL_A, title: '   ' }),
        record({ urlRef: '', title: '' }),
        record({ urlRef: URL_B, title: 'Existing' }),
      ];

      const stats = await enrichTitles(records, { enabled: true, fetchPage });

      expect(stats).toEqual({ attempted: 3, updated: 2, skippedMissingUrl: 1, errors: 0 });
      expect(records.map((r) => r.title)).toEqual(['Sparse graphs', 'Sparse graphs', '', 'Existing']);
      expect(fetchPage).toHaveBeenCalledTimes(2);
    });

    it('should replace existing titles in overwrite mode', async () => {
      const fetchPage = pageFetcher({ [URL_B]: OTHER_SUBTITLE_PAGE });
      const records = [record({ urlRef: URL_B, title: 'Existing' })];

      const stats = await enrichTitles(records, { enabled: true, overwrite: true, fetchPage });

      expect(stats.updated).toBe(1);
      expect(records[0].title).toBe('Dense graphs');
    });

    it('should change nothing on a second run without overwrite', async () => {
      const records = [record({ urlRef: URL_A, title: '' })];

      await enrichTitles(records, { enabled: true, fetchPage: pageFetcher({ [URL_A]: SUBTITLE_PAGE }) });
      const second = await enrichTitles(records, {
        enabled: true,
        fetchPage: pageFetcher({ [URL_A]: OTHER_SUBTITLE_PAGE }),
      });

      expect(second.updated).toBe(0);
      expect(records[0].title).toBe('Sparse graphs');
    });

    it('should count a failed fetch once and cache the miss', async () => {
      const fetchPage = pageFetcher({});
      const records = [record({ urlRef: URL_A, title: 'Kept' }), record({ urlRef: URL_A, title: '' })];

      const stats = await enrichTitles(records, { enabled: true, overwrite: true, fetchPage });

      expect(stats).toEqual({ attempted: 2, updated: 0, skippedMissingUrl: 0, errors: 1 });
      expect(fetchPage).toHaveBeenCalledTimes(1);
      expect(records.map((r) => r.title)).toEqual(['Kept', '']);
    });

    it('should count a throwing fetcher as an error', async () => {
      const fetchPage = jest.fn<Promise<Result<string>>, Parameters<PageFetcher>>(async () => {
        throw new Error('connection reset');
      });
      const records = [record({ urlRef: URL_A }), record({ urlRef: URL_A })];

      const stats = await enrichTitles(records, { enabled: true, fetchPage });

      expect(stats.errors).toBe(1);
      expect(stats.attempted).toBe(2);
      expect(fetchPage).toHaveBeenCalledTimes(1);
    });

    it('should leave titles alone when the page has no subtitle', async () => {
      const records = [record({ urlRef: URL_A, title: '' })];

      const stats = await enrichTitles(records, {
        enabled: true,
        fetchPage: pageFetcher({ [URL_A]: '<h1>No subtitle here</h1>' }),
      });

      expect(stats).toEqual({ attempted: 1, updated: 0, skippedMissingUrl: 0, errors: 0 });
      expect(records[0].title).toBe('');
    });

    it('should pass fetch options through to the fetcher', async () => {
      const fetchPage = pageFetcher({ [URL_A]: SUBTITLE_PAGE });
      const botBypass = { name: 'x-test-bypass', value: 'test-secret' };

      await enrichTitles([record({ urlRef: URL_A })], { enabled: true, timeoutMs: 500, botBypass, fetchPage });

      expect(fetchPage).toHaveBeenCalledWith(URL_A, { timeoutMs: 500, botBypass }, expect.anything());
    });

    it('should do nothing when disabled', async () => {
      const fetchPage = pageFetcher({ [URL_A]: SUBTITLE_PAGE });
      const records = [record({ urlRef: URL_A, title: '' })];

      const stats = await enrichTitles(records, { enabled: false, fetchPage });

      expect(stats).toEqual({ attempted: 0, updated: 0, skippedMissingUrl: 0, errors: 0 });
      expect(fetchPage).not.toHaveBeenCalled();
      expect(records[0].title).toBe('');
    });
  });

  describe('enrichContent', () => {
    it('should fill content in the requested format', async () => {
      const page = '<div class="event-body"><h2>Overview</h2><p>Some <em>new</em> results.</p></div>';
      const records = [record({ urlRef: URL_A, content: '' })];

      const stats = await enrichContent(records, {
        enabled: true,
        format: 'markdown',
        fetchPage: pageFetcher({ [URL_A]: page }),
      });

      expect(stats.updated).toBe(1);
      expect(records[0].content).toBe('## Overview\n\nSome *new* results.');
    });

    it('should default to plain text', async () => {
      const page = '<div class="event-description"><p>First.</p><p>Second.</p></div>';
      const records = [record({ urlRef: URL_A, content: '' })];

      await enrichContent(records, { enabled: true, fetchPage: pageFetcher({ [URL_A]: page }) });

      expect(records[0].content).toBe('First.\n\nSecond.');
    });

    it('should never blank existing content', async () => {
      const records = [record({ urlRef: URL_A, content: 'Keep me' })];

      const stats = await enrichContent(records, {
        enabled: true,
        overwrite: true,
        fetchPage: pageFetcher({ [URL_A]: '<div><p>no known container</p></div>' }),
      });

      expect(stats.updated).toBe(0);
      expect(records[0].content).toBe('Keep me');
    });
  });

  describe('enrichRawDetails', () => {
    it('should store the inner HTML of the details container', async () => {
      const records = [record({ urlRef: URL_A })];

      const stats = await enrichRawDetails(records, { enabled: true, fetchPage: pageFetcher({ [URL_A]: DETAILS_PAGE }) });

      expect(stats).toEqual({ attempted: 1, updated: 1, skippedMissingUrl: 0, errors: 0 });
      expect(records[0].rawEventDetails).toBe('<h2>Abstract</h2><p>We study X.</p><h2>Bio</h2><p>Prof. Y.</p>');
    });
  });

  describe('enrichRawExtracts', () => {
    it('should extract abstract and bio from raw details', () => {
      const records = [record({ rawEventDetails: DETAILS_PAGE }), record(), record({ rawEventDetails: '  ' })];

      const stats = enrichRawExtracts(records, { enabled: true });

      expect(stats).toEqual({ attempted: 1, updatedAbstract: 1, updatedBio: 1, skippedMissingDetails: 2, errors: 0 });
      expect(records[0].rawExtractAbstract).toBe('We study X.');
      expect(records[0].rawExtractBio).toBe('Prof. Y.');
      expect(records[1]).not.toHaveProperty('rawExtractAbstract');
    });

    it('should respect existing values unless overwriting', () => {
      const existing = () =>
        record({ rawEventDetails: DETAILS_PAGE, rawExtractAbstract: 'Old abstract', rawExtractBio: 'Old bio' });
      const kept = [existing()];
      const replaced = [existing()];

      const keptStats = enrichRawExtracts(kept, { enabled: true });
      const replacedStats = enrichRawExtracts(replaced, { enabled: true, overwrite: true });

      expect(keptStats.updatedAbstract + keptStats.updatedBio).toBe(0);
      expect(kept[0].rawExtractAbstract).toBe('Old abstract');
      expect(replacedStats.updatedAbstract + replacedStats.updatedBio).toBe(2);
      expect(replaced[0].rawExtractBio).toBe('Prof. Y.');
    });

    it('should not write when only one section exists', () => {
      const records = [record({ rawEventDetails: '<h2>Abstract</h2><p>Only this.</p>' })];

      const stats = enrichRawExtracts(records, { enabled: true });

      expect(stats.updatedAbstract).toBe(1);
      expect(stats.updatedBio).toBe(0);
      expect(records[0]).not.toHaveProperty('rawExtractBio');
    });

    it('should still extract the bio when the abstract fails', () => {
      const extractSection = jest.fn<string, Parameters<SectionExtractor>>((_html, marker) => {
        if (marker === 'Abstract') throw new Error('parser exploded');
        return 'Bio text';
      });
      const records = [record({ rawEventDetails: DETAILS_PAGE })];

      const stats = enrichRawExtracts(records, { enabled: true, extractSection });

      expect(stats).toEqual({ attempted: 1, updatedAbstract: 0, updatedBio: 1, skippedMissingDetails: 0, errors: 1 });
      expect(records[0].rawExtractBio).toBe('Bio text');
      expect(extractSection).toHaveBeenCalledTimes(2);
    });

    it('should do nothing when disabled', () => {
      const records = [record({ rawEventDetails: DETAILS_PAGE })];

      expect(enrichRawExtracts(records, { enabled: false })).toEqual({
        attempted: 0,
        updatedAbstract: 0,
        updatedBio: 0,
        skippedMissingDetails: 0,
        errors: 0,
      });
      expect(records[0]).not.toHaveProperty('rawExtractAbstract');
    });
  });
});
