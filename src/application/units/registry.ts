import type { Logger } from 'pino';
import type { LookupClient } from '../../domain/lookup.js';
import type { TransformUnit } from '../../domain/units/index.js';
import { AssetEnricher } from './asset-enricher.js';
import { UserEnricher } from './user-enricher.js';
import type { ThreatIntelEnricherConfig } from './threat-intel-enricher.js';
import { ThreatIntelEnricher } from './threat-intel-enricher.js';
import type { CategoryFilterConfig } from './category-filter.js';
import { CategoryFilter } from './category-filter.js';
import type { PayloadTaggerConfig } from './payload-tagger.js';
import { PayloadTagger } from './payload-tagger.js';
import type { KeyedEnricherConfig } from './keyed-lookup.js';

export const UNIT_NAMES = [
  'asset_enricher',
  'user_enricher',
  'threat_intel_enricher',
  'category_filter',
  'payload_tagger',
] as const;

export type UnitName = (typeof UNIT_NAMES)[number];

/** Declared chain order plus the settings of every unit it names. */
export interface ChainConfig {
  processors: readonly UnitName[];
  asset_enricher?: KeyedEnricherConfig | undefined;
  user_enricher?: KeyedEnricherConfig | undefined;
  threat_intel_enricher?: ThreatIntelEnricherConfig | undefined;
  category_filter: CategoryFilterConfig;
  payload_tagger: PayloadTaggerConfig;
}

export interface UnitDeps {
  client: LookupClient;
  log: Logger;
}

/**
 * Instantiates the units in declared order.
 *
 * Enrichers need an endpoint; naming one in `processors` without its
 * settings is a configuration error.
 */
export function buildUnits(config: ChainConfig, deps: UnitDeps): TransformUnit[] {
  return config.processors.map((name) => buildUnit(name, config, deps));
}

function buildUnit(name: UnitName, config: ChainConfig, deps: UnitDeps): TransformUnit {
  const log = deps.log.child({ unit: name });

  switch (name) {
    case 'asset_enricher':
      return new AssetEnricher(requireSection(config.asset_enricher, name), deps.client, log);
    case 'user_enricher':
      return new UserEnricher(requireSection(config.user_enricher, name), deps.client, log);
    case 'threat_intel_enricher':
      return new ThreatIntelEnricher(requireSection(config.threat_intel_enricher, name), deps.client, log);
    case 'category_filter':
      return new CategoryFilter(config.category_filter);
    case 'payload_tagger':
      return new PayloadTagger(config.payload_tagger);
  }
}

function requireSection<T>(section: T | undefined, name: UnitName): T {
  if (section === undefined) {
    throw new Error(`Processor "${name}" is listed but has no endpoint configured`);
  }
  return section;
}
