import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios from 'axios';
import { EBirdSource } from '../EBirdSource';
import { parseQuery } from '../../services/QueryNormalizer';
import { httpError, okResponse } from '../../test/httpFixtures';

// Mock axios.get, keep the real error helpers
vi.mock('axios', async (importOriginal) => {
  const actual = await importOriginal<typeof import('axios')>();
  return { ...actual, default: { ...actual.default, get: vi.fn() } };
});
const mockedGet = vi.mocked(axios.get);

const DAY_MS = 24 * 60 * 60 * 1000;

function observation(comName: string, obsDt: string, howMany?: number) {
  return {
    speciesCode: comName.toLowerCase().replace(/\s+/g, ''),
    comName,
    sciName: `${comName} (sci)`,
    locId: 'L123',
    locName: 'Central Park',
    obsDt,
    howMany,
    lat: 40.78,
    lng: -73.97,
    obsValid: true,
    obsReviewed: false,
    locationPrivate: false,
    subId: 'S1',
  };
}

describe('EBirdSource', () => {
  let source: EBirdSource;

  const regionQuery = parseQuery({ subject: 'birds', location: { regionCode: 'US-NY-063' } });

  beforeEach(() => {
    vi.clearAllMocks();
    // Hotspot lookups answer with an empty list unless a test says otherwise
    mockedGet.mockResolvedValue(okResponse([]));
    source = new EBirdSource();
  });

  describe('validate', () => {
    it('should accept a region or coordinates', () => {
      expect(source.validate(regionQuery)).toBeNull();
      expect(source.validate(parseQuery({ subject: 'birds', location: { lat: 40.78, lon: -73.97 } }))).toBeNull();
    });

    it('should require a region or coordinates', () => {
      expect(source.validate(parseQuery({ subject: 'birds' }))).toBe('requires a region code or coordinates');
      expect(source.validate(parseQuery({ subject: 'birds', location: { city: 'Lima' } })))
        .toBe('requires a region code or coordinates');
    });
  });

  describe('fetch', () => {
    it('should request recent observations for a region', async () => {
      mockedGet.mockResolvedValueOnce(okResponse([]));

      await source.fetch(regionQuery, { credential: 'test-secret' });

      expect(mockedGet).toHaveBeenCalledWith(
        'https://api.ebird.org/v2/data/obs/US-NY-063/recent',
        expect.objectContaining({
          params: { back: 14, maxResults: 200 },
          headers: { 'X-eBirdApiToken': 'test-secret' },
        })
      );
    });

    it('should request nearby observations for a point', async () => {
      mockedGet.mockResolvedValueOnce(okResponse([]));

      await source.fetch(
        parseQuery({ subject: 'birds', location: { lat: 40.78, lon: -73.97 } }),
        { credential: 'test-secret' }
      );

      expect(mockedGet).toHaveBeenCalledWith(
        'https://api.ebird.org/v2/data/obs/geo/recent',
        expect.objectContaining({
          params: { back: 14, maxResults: 200, lat: 40.78, lng: -73.97, dist: 25 },
        })
      );
    });

    it('should derive the look-back from the window start', async () => {
      const recent = parseQuery({
        subject: 'birds',
        location: { regionCode: 'US-NY-063' },
        window: { start: new Date(Date.now() - 3 * DAY_MS - 60 * 60 * 1000) },
      });
      const distant = parseQuery({
        subject: 'birds',
        location: { regionCode: 'US-NY-063' },
        window: { start: new Date(Date.now() - 90 * DAY_MS) },
      });

      await source.fetch(recent, { credential: 'test-secret' });
      await source.fetch(distant, { credential: 'test-secret' });

      const observationCalls = mockedGet.mock.calls.filter(([url]) => url.endsWith('/recent'));
      expect(observationCalls[0][1]?.params.back).toBe(4);
      expect(observationCalls[1][1]?.params.back).toBe(30);
    });

    it('should drop observations outside the window by calendar day', async () => {
      mockedGet.mockResolvedValueOnce(okResponse([
        observation('Blue Jay', '2026-04-30 18:00'),
        observation('American Robin', '2026-05-01 06:30'),
        observation('Northern Cardinal', '2026-05-03 21:00'),
        observation('Mallard', '2026-05-04 06:00'),
      ]));

      const result = await source.fetch(parseQuery({
        subject: 'birds',
        location: { regionCode: 'US-NY-063' },
        window: { start: '2026-05-01T00:00:00Z', end: '2026-05-03T23:59:00Z' },
      }), { credential: 'test-secret' });

      if (result.status !== 'success') throw new Error('expected success');
      expect(result.payload.birds?.totalObservations).toBe(2);
      expect(result.payload.birds?.sightings.map((s) => s.species)).toEqual(['American Robin', 'Northern Cardinal']);
      expect(result.payload.birds?.topSpecies).toEqual([
        { species: 'American Robin', count: 1 },
        { species: 'Northern Cardinal', count: 1 },
      ]);
      expect(result.payload.observedAt).toBe('2026-05-03 21:00');
    });

    it('should report nothing for sightings after the window end', async () => {
      const today = new Date().toISOString().slice(0, 10);
      mockedGet.mockResolvedValueOnce(okResponse([observation('Blue Jay', `${today} 07:00`)]));

      const result = await source.fetch(parseQuery({
        subject: 'birds',
        location: { regionCode: 'US-NY-063' },
        window: { start: new Date(Date.now() - 10 * DAY_MS), end: new Date(Date.now() - 8 * DAY_MS) },
      }), { credential: 'test-secret' });

      if (result.status !== 'success') throw new Error('expected success');
      expect(result.payload.birds?.totalObservations).toBe(0);
      expect(result.payload.birds?.speciesCount).toBe(0);
      expect(result.payload.observedAt).toBeNull();
    });

    it('should summarize sightings and rank species', async () => {
      mockedGet.mockResolvedValueOnce(okResponse([
        observation('Blue Jay', '2026-05-03 08:15', 1),
        observation('American Robin', '2026-05-04 07:30', 3),
        observation('American Robin', '2026-05-02 18:00'),
      ]));

      const result = await source.fetch(regionQuery, { credential: 'test-secret' });

      if (result.status !== 'success') throw new Error('expected success');
      expect(result.payload.birds?.totalObservations).toBe(3);
      expect(result.payload.birds?.speciesCount).toBe(2);
      expect(result.payload.birds?.topSpecies).toEqual([
        { species: 'American Robin', count: 2 },
        { species: 'Blue Jay', count: 1 },
      ]);
      expect(result.payload.birds?.sightings[1]).toEqual({
        species: 'American Robin',
        scientificName: 'American Robin (sci)',
        locationName: 'Central Park',
        observedAt: '2026-05-04 07:30',
        count: 3,
        latitude: 40.78,
        longitude: -73.97,
      });
      expect(result.payload.birds?.sightings[2].count).toBeNull();
      expect(result.payload.observedAt).toBe('2026-05-04 07:30');
      expect(result.payload.location).toEqual({ latitude: null, longitude: null, regionCode: 'US-NY-063', name: null });
    });

    it('should keep at most ten species in the ranking', async () => {
      const sightings = Array.from({ length: 12 }, (_, i) => observation(`Species ${i}`, '2026-05-04 06:00'));
      mockedGet.mockResolvedValueOnce(okResponse(sightings));

      const result = await source.fetch(regionQuery, { credential: 'test-secret' });

      if (result.status !== 'success') throw new Error('expected success');
      expect(result.payload.birds?.topSpecies).toHaveLength(10);
      expect(result.payload.birds?.topSpecies[0]).toEqual({ species: 'Species 0', count: 1 });
      expect(result.payload.birds?.speciesCount).toBe(12);
    });
  });

  describe('hotspots', () => {
    it('should look up hotspots around a point', async () => {
      await source.fetch(
        parseQuery({ subject: 'birds', location: { lat: 40.78, lon: -73.97 } }),
        { credential: 'test-secret' }
      );

      expect(mockedGet).toHaveBeenCalledTimes(2);
      expect(mockedGet).toHaveBeenCalledWith(
        'https://api.ebird.org/v2/ref/hotspot/geo',
        expect.objectContaining({
          params: { lat: 40.78, lng: -73.97, dist: 25, fmt: 'json' },
          headers: { 'X-eBirdApiToken': 'test-secret' },
        })
      );
    });

    it('should look up hotspots of a region', async () => {
      await source.fetch(regionQuery, { credential: 'test-secret' });

      expect(mockedGet).toHaveBeenCalledWith(
        'https://api.ebird.org/v2/ref/hotspot/US-NY-063',
        expect.objectContaining({ params: { fmt: 'json' } })
      );
    });

    it('should attach the hotspots to the record', async () => {
      mockedGet
        .mockResolvedValueOnce(okResponse([observation('Blue Jay', '2026-05-03 08:15', 1)]))
        .mockResolvedValueOnce(okResponse([
          {
            locId: 'L109516',
            locName: 'Central Park',
            countryCode: 'US',
            subnational1Code: 'US-NY',
            lat: 40.78,
            lng: -73.97,
            latestObsDt: '2026-05-04 07:12',
            numSpeciesAllTime: 280,
          },
          { locId: 'L2', locName: 'Prospect Park' },
        ]));

      const result = await source.fetch(regionQuery, { credential: 'test-secret' });

      if (result.status !== 'success') throw new Error('expected success');
      expect(result.payload.birds?.hotspots).toEqual([
        {
          id: 'L109516',
          name: 'Central Park',
          latitude: 40.78,
          longitude: -73.97,
          latestObservedAt: '2026-05-04 07:12',
          speciesAllTime: 280,
        },
        { id: 'L2', name: 'Prospect Park', latitude: null, longitude: null, latestObservedAt: null, speciesAllTime: null },
      ]);
    });

    it('should keep the observations when the hotspot lookup fails', async () => {
      mockedGet
        .mockResolvedValueOnce(okResponse([observation('Blue Jay', '2026-05-03 08:15', 1)]))
        .mockRejectedValueOnce(httpError(503));

      const result = await source.fetch(regionQuery, { credential: 'test-secret' });

      if (result.status !== 'success') throw new Error('expected success');
      expect(result.payload.birds?.totalObservations).toBe(1);
      expect(result.payload.birds?.hotspots).toBeNull();
    });

    it('should skip the lookup when disabled', async () => {
      const quiet = new EBirdSource({ hotspots: false });

      const result = await quiet.fetch(regionQuery, { credential: 'test-secret' });

      if (result.status !== 'success') throw new Error('expected success');
      expect(mockedGet).toHaveBeenCalledTimes(1);
      expect(result.payload.birds?.hotspots).toBeNull();
    });
  });

  describe('failures', () => {
    it('should reject calls without a credential', async () => {
      const result = await source.fetch(regionQuery);

      if (result.status !== 'failure') throw new Error('expected failure');
      expect(result.error.kind).toBe('ProviderRejected');
      expect(mockedGet).not.toHaveBeenCalled();
    });

    it('should classify a forbidden token as rejected', async () => {
      mockedGet.mockRejectedValueOnce(httpError(403));

      const result = await source.fetch(regionQuery, { credential: 'test-secret' });

      if (result.status !== 'failure') throw new Error('expected failure');
      expect(result.error).toEqual({
        kind: 'ProviderRejected',
        message: 'eBird rejected the request with 403',
        retryAfterMs: null,
      });
    });
  });
});
