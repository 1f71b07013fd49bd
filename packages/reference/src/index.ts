export {
  REFERENCE_NORMALIZATION_VERSION,
  COMPOSITE_DELIMITER,
  canonicalize,
  normalize,
  isSearchable,
  isComposite,
  segmentsOf,
} from './normalization'
export type { NormalizedReference } from './normalization'
export { extractReferenceFromDescription } from './extraction'
