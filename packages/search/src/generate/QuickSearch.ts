/**
 * QuickSearch
 *
 * Neighborhood walk over the coordinate space.
 *
 * Measures the default config, then the starting coordinate ("home"),
 * then home's neighbors in radius order. Once at least minInitialized
 * neighbors are measured and one beats home, home moves there and a new
 * neighborhood starts. An exhausted neighborhood with no improvement
 * ends the search. Home never returns to a config it has already held,
 * and reused measurements count against the budget like new ones.
 *
 * Ranking: feasible beats infeasible, infeasible candidates rank by
 * infeasibility score, feasible ones by objective-weighted gain.
 */

import { createLogger, handleError } from '@tunekit/utils';
import type { Coordinate } from './Coordinate.js';
import { QuickSearchEngine } from './QuickSearchEngine.js';
import type { RunConfig } from './RunConfig.js';
import type { SearchDimensions } from './SearchDimensions.js';
import type { ConcurrencyMode, SearchEntity } from './types.js';
import { VariantNameRegistry } from './VariantNameRegistry.js';
import type { SearchSettings } from '../config/SearchSettings.js';
import {
  ConstraintEvaluator,
  resolveConstraints,
  type ConstraintsPerModel,
} from '../result/ConstraintEvaluator.js';
import { DEFAULT_OBJECTIVES, type Objectives, type RunMeasurement } from '../result/RunMeasurement.js';

const logger = createLogger('@tunekit/search');

export const DEFAULT_MAX_MEASUREMENTS = 100;

/**
 * Runs the external benchmark for a config; undefined means no result
 */
export type MeasureFn = (runConfig: RunConfig) => Promise<RunMeasurement | undefined>;

export interface QuickSearchOptions {
  measure: MeasureFn;
  constraints?: ConstraintsPerModel;
  objectives?: Objectives;
  maxMeasurements?: number;
  evaluator?: ConstraintEvaluator;
}

export interface SearchResult {
  runConfig: RunConfig;
  measurement: RunMeasurement;
  feasible: boolean;
  infeasibilityScore: number;
}

export interface QuickSearchOutcome {
  best?: SearchResult;
  results: SearchResult[];
}

interface Candidate {
  coordinate: Coordinate;
  result: SearchResult;
}

export class QuickSearch {
  private readonly measure: MeasureFn;
  private readonly constraints: ConstraintsPerModel;
  private readonly objectives: Readonly<Objectives>;
  private readonly maxMeasurements: number;
  private readonly evaluator: ConstraintEvaluator;
  private readonly measured = new Map<string, SearchResult>();
  private readonly results: SearchResult[] = [];
  private readonly homeKeys = new Set<string>();
  private reused = 0;

  constructor(
    private readonly engine: QuickSearchEngine,
    options: QuickSearchOptions
  ) {
    this.measure = options.measure;
    this.constraints = options.constraints ?? [];
    this.objectives = options.objectives ?? DEFAULT_OBJECTIVES;
    this.maxMeasurements = options.maxMeasurements ?? DEFAULT_MAX_MEASUREMENTS;
    this.evaluator = options.evaluator ?? new ConstraintEvaluator();
  }

  async run(): Promise<QuickSearchOutcome> {
    const { dimensions, radius, minInitialized } = this.engine.getSearchConfig();

    logger.info('Starting quick search', {
      slots: dimensions.slotCount,
      radius,
      minInitialized,
      maxMeasurements: this.maxMeasurements,
    });

    if (this.engine.getPhase() === 'default') {
      await this.measureRunConfig(this.engine.next());
    }

    let home = this.engine.getStartingCoordinate();
    let homeResult = await this.measureAt(home);
    this.markHome(homeResult);
    const visited = new Set<string>([home.toString()]);

    while (!this.budgetExhausted()) {
      let best: Candidate | undefined;
      let initialized = 0;
      let moved = false;

      for (const neighbor of home.neighborsWithinRadius(radius)) {
        if (this.budgetExhausted()) {
          break;
        }
        if (!dimensions.isWithinBounds(neighbor) || visited.has(neighbor.toString())) {
          continue;
        }
        visited.add(neighbor.toString());

        const result = await this.measureAt(neighbor);
        if (result === undefined) {
          continue;
        }
        initialized++;

        if (best === undefined || this.isBetter(result, best.result)) {
          best = { coordinate: neighbor, result };
        }

        if (initialized >= minInitialized && this.canMoveTo(best.result, homeResult)) {
          moved = true;
          break;
        }
      }

      // An exhausted neighborhood still moves if its best beats home
      if (best === undefined || (!moved && !this.canMoveTo(best.result, homeResult))) {
        break;
      }

      logger.debug('Moving search home', {
        from: home.toString(),
        to: best.coordinate.toString(),
        neighborsMeasured: initialized,
      });
      home = best.coordinate;
      homeResult = best.result;
      this.markHome(homeResult);
    }

    const best = this.results.reduce<SearchResult | undefined>(
      (current, result) =>
        current === undefined || this.isBetter(result, current) ? result : current,
      undefined
    );

    logger.info('Quick search completed', {
      measured: this.results.length,
      reused: this.reused,
      bestConfig: best?.runConfig.key(),
      bestFeasible: best?.feasible,
    });

    return { best, results: [...this.results] };
  }

  private budgetExhausted(): boolean {
    return this.results.length + this.reused >= this.maxMeasurements;
  }

  private markHome(result: SearchResult | undefined): void {
    if (result !== undefined) {
      this.homeKeys.add(result.runConfig.key());
    }
  }

  /**
   * Never true for a config that has already been home; weighted gains
   * over several objectives can rank two configs above each other
   */
  private canMoveTo(candidate: SearchResult, home: SearchResult | undefined): boolean {
    if (this.homeKeys.has(candidate.runConfig.key())) {
      return false;
    }
    return home === undefined || this.isBetter(candidate, home);
  }

  private isBetter(a: SearchResult, b: SearchResult): boolean {
    if (a.feasible !== b.feasible) {
      return a.feasible;
    }
    if (!a.feasible) {
      return a.infeasibilityScore < b.infeasibilityScore;
    }
    return a.measurement.isBetterThan(b.measurement, this.objectives);
  }

  private async measureAt(coordinate: Coordinate): Promise<SearchResult | undefined> {
    this.engine.setCoordinateToMeasure(coordinate);
    return this.measureRunConfig(this.engine.next());
  }

  /**
   * Measure a config once; configs with an already-measured key reuse
   * that measurement
   */
  private async measureRunConfig(runConfig: RunConfig): Promise<SearchResult | undefined> {
    const key = runConfig.key();

    const previous = this.measured.get(key);
    if (previous !== undefined) {
      this.reused++;
      logger.debug('Reusing measurement for equivalent config', {
        config: key,
        coordinate: runConfig.coordinate?.toString(),
      });
      return previous;
    }

    if (this.budgetExhausted()) {
      return undefined;
    }

    let measurement: RunMeasurement | undefined;
    try {
      measurement = await this.measure(runConfig);
    } catch (error) {
      handleError(error, { config: key, coordinate: runConfig.coordinate?.toString() });
      return undefined;
    }

    if (measurement === undefined) {
      logger.warn('No measurement returned for config', { config: key });
      return undefined;
    }

    const result: SearchResult = {
      runConfig,
      measurement,
      feasible: this.evaluator.satisfies(this.constraints, measurement),
      infeasibilityScore: this.evaluator.infeasibilityScore(this.constraints, measurement),
    };

    this.measured.set(key, result);
    this.results.push(result);

    logger.debug('Measured config', {
      config: key,
      coordinate: runConfig.coordinate?.toString(),
      feasible: result.feasible,
      infeasibilityScore: result.infeasibilityScore,
    });

    return result;
  }
}

export interface CreateQuickSearchOptions {
  entities: SearchEntity[];
  dimensions: SearchDimensions;
  settings: SearchSettings;
  measure: MeasureFn;
  registry?: VariantNameRegistry;
  concurrencyMode?: ConcurrencyMode;
}

/**
 * Wire an engine and driver from loaded settings
 */
export function createQuickSearch(options: CreateQuickSearchOptions): QuickSearch {
  const { settings } = options;

  const engine = new QuickSearchEngine({
    searchConfig: {
      dimensions: options.dimensions,
      radius: settings.radius,
      minInitialized: settings.minInitialized,
      concurrencyMode: options.concurrencyMode,
    },
    entities: options.entities,
    registry: options.registry ?? new VariantNameRegistry(),
    bounds: settings.bounds,
  });

  return new QuickSearch(engine, {
    measure: options.measure,
    constraints: resolveConstraints(
      options.entities.map((entity) => entity.name),
      settings.constraints
    ),
    objectives: settings.objectives,
    maxMeasurements: settings.maxMeasurements,
  });
}
