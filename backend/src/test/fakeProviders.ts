import { NormalizedRecord, Query, Subject } from '../types/EnvironmentalData';
import { FetchContext, ProviderAdapter } from '../services/ProviderAdapter';
import { createNormalizedRecord } from '../utils/recordUtils';

/**
 * In-process provider doubles for aggregator and router tests
 */

export type Step = NormalizedRecord | Error | 'hang';
export type Requirement = 'none' | 'location' | 'point';

// Scripted adapter: each call consumes one step, the last step repeats
export class FakeAdapter extends ProviderAdapter {
  readonly contexts: FetchContext[] = [];
  private readonly steps: Step[];
  private readonly requirement: Requirement;

  constructor(name: string, subject: Subject, steps: Step[], requirement: Requirement = 'none', enabled = true) {
    super({ name, subject, enabled });
    this.steps = steps;
    this.requirement = requirement;
  }

  get calls(): number {
    return this.contexts.length;
  }

  validate(query: Query): string | null {
    if (this.requirement === 'point' && query.location?.kind !== 'point') {
      return 'requires coordinates';
    }
    if (this.requirement === 'location' && !query.location) {
      return 'requires a location';
    }
    return null;
  }

  protected async request(_query: Query, context: FetchContext): Promise<NormalizedRecord> {
    this.contexts.push(context);
    const step = this.steps.length > 1 ? this.steps.shift() : this.steps[0];
    if (step === undefined) {
      throw new Error('no scripted response');
    }
    if (step === 'hang') {
      return new Promise<NormalizedRecord>((_resolve, reject) => {
        if (context.signal?.aborted) {
          reject(new Error('aborted'));
          return;
        }
        context.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

export function airRecord(aqi: number, provider: string = 'FakeAir'): NormalizedRecord {
  return createNormalizedRecord('airQuality', provider, {
    airQuality: {
      aqi,
      category: null,
      color: null,
      dominantPollutant: null,
      stationName: null,
      stationCount: 1,
      pollutants: [],
      forecast: null,
      stations: null,
    },
  });
}

export function birdRecord(): NormalizedRecord {
  return createNormalizedRecord('birds', 'FakeBirds', {
    birds: {
      totalObservations: 1,
      speciesCount: 1,
      topSpecies: [{ species: 'American Robin', count: 1 }],
      sightings: [],
      hotspots: null,
    },
  });
}

