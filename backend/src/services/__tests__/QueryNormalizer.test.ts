import { describe, it, expect } from 'vitest';
import { MalformedQueryError } from '../../errors/ProviderError';
import { parseQuery, serializeQuery } from '../QueryNormalizer';

describe('QueryNormalizer', () => {
  const now = new Date('2026-05-04T12:00:00Z');

  describe('parseQuery', () => {
    it('should merge subject and subjects without duplicates', () => {
      const query = parseQuery({ subject: 'news', subjects: ['birds', 'airQuality', 'birds'] });

      expect(query.subjects).toEqual(['news', 'birds', 'airQuality']);
      expect(query.location).toBeNull();
      expect(query.window).toBeNull();
      expect(query.providers).toBeNull();
    });

    it('should accept numeric strings and lng as an alias of lon', () => {
      const query = parseQuery({ subject: 'airQuality', location: { lat: '40.7', lng: '-74' } });

      expect(query.location).toEqual({ kind: 'point', latitude: 40.7, longitude: -74 });
    });

    it('should upper-case region codes', () => {
      const query = parseQuery({ subject: 'birds', location: { regionCode: ' us-ny-063 ' } });

      expect(query.location).toEqual({ kind: 'region', regionCode: 'US-NY-063' });
    });

    it('should accept a city name', () => {
      const query = parseQuery({ subject: 'airQuality', location: { city: '  Beijing ' } });

      expect(query.location).toEqual({ kind: 'city', name: 'Beijing' });
    });

    it('should default the window end to now', () => {
      const query = parseQuery({ subject: 'news', window: { start: '2026-05-01T00:00:00Z' } }, now);

      expect(query.window?.start.toISOString()).toBe('2026-05-01T00:00:00.000Z');
      expect(query.window?.end).toBe(now);
    });

    it('should de-duplicate the provider filter', () => {
      const query = parseQuery({ subject: 'airQuality', providers: ['AQICN', 'AQICN', 'OpenAQ'] });

      expect(query.providers).toEqual(['AQICN', 'OpenAQ']);
    });

    it('should freeze the query', () => {
      const query = parseQuery({ subject: 'airQuality', location: { lat: 1, lon: 2 } });

      expect(Object.isFrozen(query)).toBe(true);
      expect(Object.isFrozen(query.subjects)).toBe(true);
      expect(Object.isFrozen(query.location)).toBe(true);
    });
  });

  describe('malformed input', () => {
    it('should require a subject', () => {
      expect(() => parseQuery({})).toThrow(MalformedQueryError);
      expect(() => parseQuery({})).toThrow('subject: subject or subjects is required');
    });

    it('should reject unknown subjects', () => {
      expect(() => parseQuery({ subjects: ['weather'] })).toThrow(/^subjects\.0: Invalid enum value/);
    });

    it('should reject out of range coordinates', () => {
      expect(() => parseQuery({ subject: 'airQuality', location: { lat: 95, lon: 0 } })).toThrow(/^location(\.lat)?: /);
    });

    it('should reject missing or non-numeric coordinates', () => {
      for (const location of [
        { lat: null, lon: null },
        { lat: '', lon: '' },
        { lat: '  ', lon: '2' },
        { lat: false, lon: true },
        { lat: 'north', lon: '2' },
      ]) {
        expect(() => parseQuery({ subject: 'airQuality', location })).toThrow(MalformedQueryError);
      }
    });

    it('should reject a null or blank window start', () => {
      expect(() => parseQuery({ subject: 'news', window: { start: null } })).toThrow(/^window\.start: /);
      expect(() => parseQuery({ subject: 'news', window: { start: '' } })).toThrow(/^window\.start: /);
      expect(() => parseQuery({ subject: 'news', window: { start: 'yesterday' } })).toThrow(/^window\.start: /);
    });

    it('should reject a null window end', () => {
      expect(() => parseQuery({ subject: 'news', window: { start: '2026-05-01T00:00:00Z', end: null } }))
        .toThrow(/^window\.end: /);
    });

    it('should reject a window that ends before it starts', () => {
      expect(() => parseQuery({
        subject: 'news',
        window: { start: '2026-05-02T00:00:00Z', end: '2026-05-01T00:00:00Z' },
      })).toThrow('window.end: window end must not precede start');
    });

    it('should reject an open window starting in the future', () => {
      expect(() => parseQuery({ subject: 'news', window: { start: '2030-01-01T00:00:00Z' } }, now))
        .toThrow('window.start: must not be in the future');
    });

    it('should reject input that is not an object', () => {
      expect(() => parseQuery(null)).toThrow('query: Expected object, received null');
    });
  });

  describe('serializeQuery', () => {
    it('should render the window as ISO strings', () => {
      const query = parseQuery({
        subjects: ['birds'],
        location: { regionCode: 'US-NY-063' },
        window: { start: '2026-05-01T00:00:00Z', end: '2026-05-02T00:00:00Z' },
        providers: ['eBird'],
      });

      expect(serializeQuery(query)).toEqual({
        subjects: ['birds'],
        location: { kind: 'region', regionCode: 'US-NY-063' },
        window: { start: '2026-05-01T00:00:00.000Z', end: '2026-05-02T00:00:00.000Z' },
        providers: ['eBird'],
      });
    });
  });
});
