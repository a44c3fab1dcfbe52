export type MetadataScalar = string | number | boolean | null;

export type MetadataValue = MetadataScalar | MetadataValue[] | MetadataObject;

export interface MetadataObject {
  [key: string]: MetadataValue;
}

/** Chunk metadata: opaque to the store, returned exactly as written. */
export type ChunkMetadata = MetadataObject;
