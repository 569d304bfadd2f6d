/**
 * @tunekit/search - Coordinate-based run config search
 *
 * Provides dimensions and coordinates, the quick search engine and
 * driver, variant naming, metric records, measurements and constraint
 * evaluation.
 */

export * from './errors.js';

// Generation
export * from './generate/types.js';
export * from './generate/SearchDimension.js';
export * from './generate/SearchDimensions.js';
export * from './generate/Coordinate.js';
export * from './generate/GlobalBounds.js';
export * from './generate/VariantNameRegistry.js';
export * from './generate/SearchEntities.js';
export * from './generate/RunConfig.js';
export * from './generate/QuickSearchEngine.js';
export * from './generate/QuickSearch.js';

// Records and results
export * from './record/MetricRecord.js';
export * from './record/metrics.js';
export * from './result/RunMeasurement.js';
export * from './result/ConstraintEvaluator.js';

// Settings
export * from './config/SearchSettings.js';
