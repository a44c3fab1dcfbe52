import type { ChunkMetadata, MetadataValue } from "@chunkgraph/shared";

export function isMetadataValue(value: unknown): value is MetadataValue {
  if (value === null) {
    return true;
  }
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) {
        return value.every(isMetadataValue);
      }
      return isMetadataObject(value);
    default:
      return false;
  }
}

export function isMetadataObject(value: unknown): value is ChunkMetadata {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(isMetadataValue);
}

/** Decodes metadata persisted as JSON text; anything unreadable becomes `{}`. */
export function parseStoredMetadata(raw: unknown): ChunkMetadata {
  if (isMetadataObject(raw)) {
    return raw;
  }
  if (typeof raw !== "string" || raw.length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isMetadataObject(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/**
 * Collects every string and number leaf of the metadata tree, lowercased.
 * Keys are left out so that `source` never matches a query for "source".
 */
export function flattenMetadataText(metadata: ChunkMetadata): string[] {
  const leaves: string[] = [];
  const visit = (value: MetadataValue): void => {
    if (value === null || typeof value === "boolean") {
      return;
    }
    if (typeof value === "string" || typeof value === "number") {
      leaves.push(String(value).toLowerCase());
      return;
    }
    if (Array.isArray(value)) {
      value.forEach(visit);
      return;
    }
    Object.values(value).forEach(visit);
  };
  visit(metadata);
  return leaves;
}
