export interface RetrievedChunk {
  content: string;
  source: string;
  score: number;
  section?: string;
}

/** Ranked lookup over indexed documents. Fusion and ranking are the engine's business. */
export interface Retriever {
  retrieve(query: string, k: number): Promise<RetrievedChunk[]>;
}
