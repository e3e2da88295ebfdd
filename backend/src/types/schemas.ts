import { z } from 'zod';
import { NormalizedRecord, SUBJECTS } from './EnvironmentalData';

/**
 * Runtime schemas for data crossing the process boundary:
 * inbound dashboard queries and cache snapshots read back from disk
 */

export const subjectSchema = z.enum(SUBJECTS);

const REGION_CODE = /^[A-Za-z]{2,3}(-[A-Za-z0-9]{1,4}){0,2}$/;

// Numbers or numeric strings only: null, "" and booleans would coerce to real values
const coordinate = (min: number, max: number) =>
  z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite().min(min).max(max));

const instant = z.union([z.date(), z.number(), z.string().trim().min(1)]).pipe(z.coerce.date());

const pointInputSchema = z.object({
  lat: coordinate(-90, 90),
  lon: coordinate(-180, 180),
});

const regionInputSchema = z.object({
  regionCode: z
    .string()
    .trim()
    .regex(REGION_CODE, 'must be a country or region code such as BR or US-NY-063')
    .transform((code) => code.toUpperCase()),
});

// `lng` is accepted as an alias of `lon`
function aliasLongitude(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && 'lng' in value && !('lon' in value)) {
    const { lng, ...rest } = value;
    return { ...rest, lon: lng };
  }
  return value;
}

const cityInputSchema = z.object({
  city: z.string().trim().min(1).max(100),
});

export const locationInputSchema = z.preprocess(
  aliasLongitude,
  z.union([pointInputSchema, regionInputSchema, cityInputSchema])
);

export const windowInputSchema = z
  .object({
    start: instant,
    end: instant.optional(),
  })
  .refine((w) => w.end === undefined || w.end.getTime() >= w.start.getTime(), {
    message: 'window end must not precede start',
    path: ['end'],
  });

export const queryInputSchema = z
  .object({
    subject: subjectSchema.optional(),
    subjects: z.array(subjectSchema).min(1).optional(),
    location: locationInputSchema.nullish(),
    window: windowInputSchema.nullish(),
    providers: z.array(z.string().trim().min(1)).min(1).nullish(),
  })
  .refine((q) => q.subject !== undefined || q.subjects !== undefined, {
    message: 'subject or subjects is required',
    path: ['subject'],
  });

export type QueryInput = z.input<typeof queryInputSchema>;

// =============================================================================
// NormalizedRecord (cache snapshots)
// =============================================================================

const nullableNumber = z.number().nullable();
const nullableString = z.string().nullable();

const pollutantReadingSchema = z.object({
  parameter: z.string(),
  value: nullableNumber,
  unit: nullableString,
  lastUpdated: nullableString,
});

const forestAreaPointSchema = z.object({
  year: z.number(),
  forestAreaPercent: z.number(),
});

export const normalizedRecordSchema: z.ZodType<NormalizedRecord> = z.object({
  subject: subjectSchema,
  provider: z.string(),
  location: z.object({
    latitude: nullableNumber,
    longitude: nullableNumber,
    regionCode: nullableString,
    name: nullableString,
  }),
  observedAt: nullableString,
  airQuality: z
    .object({
      aqi: nullableNumber,
      category: nullableString,
      color: nullableString,
      dominantPollutant: nullableString,
      stationName: nullableString,
      stationCount: nullableNumber,
      pollutants: z.array(pollutantReadingSchema),
      forecast: z
        .array(
          z.object({
            parameter: z.string(),
            day: z.string(),
            avg: nullableNumber,
            min: nullableNumber,
            max: nullableNumber,
          })
        )
        .nullable(),
      stations: z
        .array(
          z.object({
            name: z.string(),
            city: nullableString,
            latitude: nullableNumber,
            longitude: nullableNumber,
            measurements: z.array(pollutantReadingSchema),
          })
        )
        .nullable(),
    })
    .nullable(),
  deforestation: z
    .object({
      country: nullableString,
      indicator: z.string(),
      series: z.array(forestAreaPointSchema),
      latest: forestAreaPointSchema.nullable(),
      earliest: forestAreaPointSchema.nullable(),
      changePercentPoints: nullableNumber,
      lossDetected: z.boolean().nullable(),
    })
    .nullable(),
  birds: z
    .object({
      totalObservations: z.number(),
      speciesCount: z.number(),
      topSpecies: z.array(z.object({ species: z.string(), count: z.number() })),
      sightings: z.array(
        z.object({
          species: z.string(),
          scientificName: nullableString,
          locationName: nullableString,
          observedAt: nullableString,
          count: nullableNumber,
          latitude: nullableNumber,
          longitude: nullableNumber,
        })
      ),
      hotspots: z
        .array(
          z.object({
            id: z.string(),
            name: z.string(),
            latitude: nullableNumber,
            longitude: nullableNumber,
            latestObservedAt: nullableString,
            speciesAllTime: nullableNumber,
          })
        )
        .nullable(),
    })
    .nullable(),
  news: z
    .object({
      total: z.number(),
      articles: z.array(
        z.object({
          title: z.string(),
          link: z.string(),
          summary: nullableString,
          publishedAt: nullableString,
          source: z.string(),
        })
      ),
    })
    .nullable(),
});
