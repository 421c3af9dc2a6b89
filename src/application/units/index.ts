export { AssetEnricher, ASSET_ENRICH_ERROR_KEY, deriveAssetTags } from './asset-enricher.js';
export { UserEnricher, USER_ENRICH_ERROR_KEY } from './user-enricher.js';
export {
  ThreatIntelEnricher,
  ENRICHED_COUNT_KEY,
  THREAT_INTEL_ERROR_KEY,
  observableTypeId,
} from './threat-intel-enricher.js';
export type { ThreatIntelEnricherConfig } from './threat-intel-enricher.js';
export { CategoryFilter } from './category-filter.js';
export type { CategoryFilterConfig } from './category-filter.js';
export { PayloadTagger, DEFAULT_TAG_FIELDS, deriveTags } from './payload-tagger.js';
export type { PayloadTaggerConfig } from './payload-tagger.js';
export { lookupByField } from './keyed-lookup.js';
export type { KeyedEnricherConfig, KeyedLookupResult } from './keyed-lookup.js';
export { buildUnits, UNIT_NAMES } from './registry.js';
export type { ChainConfig, UnitDeps, UnitName } from './registry.js';
