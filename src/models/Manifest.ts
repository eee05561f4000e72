import * as D from 'io-ts/lib/Decoder'

export const ManifestEntry = D.struct({
  url: D.string,
  path: D.string,
})
export interface ManifestEntry extends D.TypeOf<typeof ManifestEntry> {}

export const Manifest = D.array(ManifestEntry)
export type Manifest = D.TypeOf<typeof Manifest>
