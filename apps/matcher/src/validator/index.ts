export { score, urlPath } from './score'
export type { ScoreOptions } from './score'
export { toPageSignals, missingSignalFields } from './signals'
export type { ExpectedSignalField } from './signals'
export { createVerdict, clampToBand, isAccepted, noMatch } from './verdict'
export type { VerdictInput } from './verdict'
export { CONFIDENCE_BANDS, DEFAULT_ACCEPT_THRESHOLD, MATCH_TYPES } from './types'
export type { ConfidenceBand, MatchType, MatchVerdict, PageSignals, PageSignalsInput } from './types'
