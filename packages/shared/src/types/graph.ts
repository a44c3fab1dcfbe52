export interface RelationshipKey {
  indexName: string;
  sourceDocId: string;
  targetDocId: string;
  relType: string;
}

export interface RelationshipEdge extends RelationshipKey {
  reason: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface RelationshipUpsertResult {
  edge: RelationshipEdge;
  created: boolean;
}

export interface IndexAnalytics {
  indexName: string;
  chunkCount: number;
  edgeCount: number;
  relTypeDistribution: Record<string, number>;
  sampleEdges: RelationshipEdge[];
}
