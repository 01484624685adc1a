export interface RetrievedDocument {
  id: string | null;
  title: string | null;
  content: string;
  metadata: Record<string, unknown>;
  similarity: number;
}

/** A document built in-process (pricing or capacity analysis) rather than read from the knowledge base. */
export const syntheticDocument = (
  content: string,
  metadata: Record<string, unknown>,
): RetrievedDocument => ({
  id: null,
  title: null,
  content,
  metadata,
  similarity: 1,
});

export const documentSource = (document: RetrievedDocument): string => {
  const source = document.metadata.source;
  return typeof source === 'string' ? source : 'unknown';
};
