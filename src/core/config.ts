import dotenv from 'dotenv';

dotenv.config();

export const config = {
  server: {
    port: parseInt(process.env.PORT || '3002'),
    env: process.env.NODE_ENV || 'development',
  },
  mongodb: {
    uri: process.env.MONGODB_URI || 'mongodb://localhost:27017/form-pilot',
    dbName: process.env.MONGODB_DB_NAME || 'form-pilot',
  },
  llm: {
    apiKey: process.env.LLM_API_KEY || '',
    baseUrl: process.env.LLM_BASE_URL || 'https://openrouter.ai/api/v1',
    requestsPerMinute: parseInt(process.env.LLM_REQUESTS_PER_MINUTE || '50'),
  },
  models: {
    extraction: process.env.EXTRACTION_MODEL || 'meta-llama/llama-3.1-70b-instruct',
  },
  extraction: {
    timeout: parseInt(process.env.EXTRACTION_TIMEOUT || '20000'), // 20s per backend call
    minConfidence: parseFloat(process.env.EXTRACTION_MIN_CONFIDENCE || '0.3'),
    lexicalConfirmation: process.env.EXTRACTION_LEXICAL_CONFIRMATION !== 'false',
    historyWindow: 5,
  },
  execution: {
    turnTimeout: parseInt(process.env.TURN_TIMEOUT || '45000'), // whole turn, extraction included
    escalationThreshold: 3,
  },
  sessions: {
    store: process.env.SESSION_STORE === 'mongo' ? 'mongo' : 'memory',
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
} as const;
