export interface RagIndex {
  name: string;
  dimension: number;
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface RagIndexPatch {
  description?: string | null;
}
