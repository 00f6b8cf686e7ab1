/**
 * FIPS join between population records and boundary features.
 */

import type {
  BoundaryFeature,
  CountyAttributes,
  CountyFeature,
  PopulationRecord,
} from '../../../schemas/county.js';
import { boundaryFips } from './boundaries.js';
import { roundTo } from './derive.js';

export interface JoinResult {
  features: CountyFeature[];
  matched: number;
  unmatched: string[];
}

/**
 * Lookup from FIPS to the attribute set attached to a matching boundary.
 * A later record with the same FIPS replaces an earlier one.
 */
export function buildAttributeLookup(records: PopulationRecord[]): Map<string, CountyAttributes> {
  const lookup = new Map<string, CountyAttributes>();

  for (const record of records) {
    lookup.set(record.fips, {
      population: record.population,
      populationFormatted: record.populationFormatted,
      logPop: roundTo(record.logPop, 4),
      quantile: roundTo(record.quantile, 4),
      fillColor: record.fillColor,
      countyName: record.name,
      fips: record.fips,
    });
  }

  return lookup;
}

/**
 * Attach attributes to every boundary whose FIPS is in the lookup and drop
 * the rest. Geometry and existing properties are carried over as-is; the
 * input features are not mutated.
 */
export function joinBoundaries(
  boundaries: BoundaryFeature[],
  lookup: Map<string, CountyAttributes>
): JoinResult {
  const features: CountyFeature[] = [];
  const unmatched: string[] = [];

  for (const feature of boundaries) {
    const fips = boundaryFips(feature);
    const attributes = lookup.get(fips);

    if (!attributes) {
      unmatched.push(fips);
      continue;
    }

    features.push({
      ...feature,
      properties: {
        ...(feature.properties ?? {}),
        ...attributes,
      },
    });
  }

  return {
    features,
    matched: features.length,
    unmatched,
  };
}
