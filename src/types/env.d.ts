declare namespace NodeJS {
  interface ProcessEnv {
    ANTHROPIC_API_KEY?: string;
    OUTPUT_DIR?: string;
    REQUEST_TIMEOUT?: string;
    WORKER_CONCURRENCY?: string;
    MAX_RETRIES?: string;
    RETRY_DELAY?: string;
    RELATIONS_MODEL?: string;
    RELATIONS_MAX_TOKENS?: string;
  }
}
