import { isComposite, isSearchable, normalize, REFERENCE_NORMALIZATION_VERSION } from '@refwatch/reference'

interface NormalizeCommandArgs {
  ref: string
}

export function runNormalizeCommand(args: NormalizeCommandArgs): number {
  if (!args.ref) {
    console.error('Missing --ref <reference>')
    return 2
  }

  const reference = normalize(args.ref)
  console.log(
    JSON.stringify(
      {
        raw: args.ref,
        canonical: reference.canonical,
        parts: reference.parts,
        searchable: isSearchable(reference),
        composite: isComposite(reference),
        version: REFERENCE_NORMALIZATION_VERSION,
      },
      null,
      2
    )
  )
  return isSearchable(reference) ? 0 : 1
}
