import dotenv from 'dotenv';

dotenv.config();

function readFloat(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
  mongodb: {
    uri: process.env.MONGODB_URI || 'mongodb://localhost:27017/graphrag',
    dbName: process.env.MONGODB_DB_NAME || 'graphrag',
    vectorSearchEnabled: process.env.VECTOR_SEARCH_ENABLED === 'true',
    vectorIndexName: process.env.VECTOR_INDEX_NAME || 'vector',
    // Documents scanned by the in-process cosine fallback
    fallbackScanLimit: readInt(process.env.VECTOR_FALLBACK_SCAN_LIMIT, 500),
  },
  openrouter: {
    apiKey: process.env.OPENROUTER_API_KEY || '',
    baseUrl: process.env.OPENROUTER_BASE_URL || 'https://openrouter.ai/api/v1',
  },
  openai: {
    apiKey: process.env.OPENAI_API_KEY || '',
    embeddingModel: process.env.EMBEDDING_MODEL || 'text-embedding-3-small',
    queryPrefix: process.env.EMBEDDING_QUERY_PREFIX || '',
  },
  server: {
    port: readInt(process.env.PORT, 3002),
    env: process.env.NODE_ENV || 'development',
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
  models: {
    classifier: process.env.CLASSIFIER_MODEL || 'meta-llama/llama-3.1-8b-instruct',
    reranker: process.env.RERANKER_MODEL || 'meta-llama/llama-3.1-8b-instruct',
    generator: process.env.GENERATOR_MODEL || 'meta-llama/llama-3.1-70b-instruct',
  },
  retrieval: {
    vectorTopK: readInt(process.env.VECTOR_TOP_K, 10),
  },
  intent: {
    // Used when the model omits confidence or returns something outside [0,1]
    defaultConfidence: readFloat(process.env.INTENT_DEFAULT_CONFIDENCE, 0.5),
  },
  graph: {
    maxFacts: readInt(process.env.GRAPH_MAX_FACTS, 30),
    maxNeighbors: readInt(process.env.GRAPH_MAX_NEIGHBORS, 5),
    entityCacheTtlMs: readInt(process.env.GRAPH_ENTITY_CACHE_TTL, 60000),
    maxNeighborhoodHops: readInt(process.env.GRAPH_MAX_NEIGHBORHOOD_HOPS, 3),
  },
  rerank: {
    blendWeight: readFloat(process.env.RERANK_BLEND_WEIGHT, 0.6),
    graphBaselineScore: readFloat(process.env.RERANK_GRAPH_BASELINE, 0.9),
    maxCandidates: readInt(process.env.RERANK_MAX_CANDIDATES, 20),
  },
  fusion: {
    weights: {
      intent: readFloat(process.env.FUSION_WEIGHT_INTENT, 0.2),
      vector: readFloat(process.env.FUSION_WEIGHT_VECTOR, 0.3),
      rerank: readFloat(process.env.FUSION_WEIGHT_RERANK, 0.5),
    },
    tierSize: readFloat(process.env.FUSION_TIER_SIZE, 0.25),
    maxEvidence: readInt(process.env.FUSION_MAX_EVIDENCE, 15),
    minDocumentSlots: readInt(process.env.FUSION_MIN_DOCUMENT_SLOTS, 3),
    lowConfidenceThreshold: readFloat(process.env.LOW_CONFIDENCE_THRESHOLD, 0.3),
  },
  session: {
    ttlMs: readInt(process.env.SESSION_TTL, 1800000), // 30 min
    maxTurns: readInt(process.env.SESSION_MAX_TURNS, 10),
    sweepIntervalMs: readInt(process.env.SESSION_SWEEP_INTERVAL, 60000),
  },
  traces: {
    ttlMs: readInt(process.env.TRACE_TTL, 3600000),
    sweepIntervalMs: readInt(process.env.TRACE_SWEEP_INTERVAL, 300000),
  },
  execution: {
    // Timeout settings (in milliseconds)
    llmTimeout: readInt(process.env.LLM_TIMEOUT, 30000),
    embedTimeout: readInt(process.env.EMBED_TIMEOUT, 10000),
    dbTimeout: readInt(process.env.DB_TIMEOUT, 10000),
    totalTimeout: readInt(process.env.TOTAL_TIMEOUT, 120000),

    enableParallelExecution: process.env.ENABLE_PARALLEL_EXECUTION !== 'false',
    llmRequestsPerMinute: readInt(process.env.LLM_REQUESTS_PER_MINUTE, 120),
  },
};

export type AppConfig = typeof config;
export type FusionWeights = AppConfig['fusion']['weights'];
