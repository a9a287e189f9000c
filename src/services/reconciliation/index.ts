export {
  buildIdentityIndex,
  type IdentityIndex,
  identifierKey,
  titleYearKey,
} from './identity-index.js'
export {
  type MatchingOptions,
  matchByFuzzyTitle,
  matchByIdentifier,
  matchByTitleYear,
  matchRecord,
  reconcile,
} from './reconciler.js'
export {
  type KindPartition,
  type MergedMissing,
  mergeMissing,
  missingRecordKey,
  partitionAndMatch,
  partitionByKind,
} from './record-aggregator.js'
export {
  InvalidMediaRecordError,
  parseMatchingOptions,
  validateRecords,
} from './record-validation.js'
export {
  findBestTitle,
  type TitleCandidate,
  type TitleScorer,
  weightedRatio,
} from './title-similarity.js'
