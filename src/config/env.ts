import path from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const envPath = path.resolve(__dirname, '../../.env');
dotenv.config({ path: envPath });

export interface DatabaseConfig {
  host: string;
  port: number;
  name: string;
  username: string;
  password: string;
  adminDatabase: string;
  ssl: boolean;
  sslRejectUnauthorized: boolean;
  logging: boolean;
}

export interface RateLimitConfig {
  windowMs: number;
  max: number;
}

export interface LLMConfig {
  baseURL: string;
  model: string;
  timeout: number;
}

export interface OpenAIConfig {
  apiKey?: string;
  model: string;
}

export interface MarketSourceConfig {
  name: string;
  url: string;
}

export interface MarketConfig {
  sources: MarketSourceConfig[];
  sourceTimeout: number;
  freshnessHours: number;
}

export type OfferSelectionPolicy = 'first' | 'highest_confidence';

export interface NegotiationConfig {
  maxRounds: number;
  marginTarget: number;
  satisfactionPriority: number;
  budgetMin: number;
  budgetMax: number;
  selectionPolicy: OfferSelectionPolicy;
  advisorTimeout: number;
  proposalTimeout: number;
  historyLimit: number;
}

export interface CORSConfig {
  origin: string | string[];
  credentials: boolean;
}

export interface EnvironmentConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;
  database: DatabaseConfig;
  rateLimit: RateLimitConfig;
  llm: LLMConfig;
  openai: OpenAIConfig;
  market: MarketConfig;
  negotiation: NegotiationConfig;
  cors: CORSConfig;
}

/**
 * Parses `MARKET_SOURCES`, e.g. `listings|https://prices.example/api,valuation|https://quotes.example/v1`.
 */
export const parseMarketSources = (raw: string | undefined): MarketSourceConfig[] => {
  if (!raw) return [];
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => {
      const separator = entry.indexOf('|');
      if (separator === -1) {
        return { name: entry, url: entry };
      }
      return { name: entry.slice(0, separator).trim(), url: entry.slice(separator + 1).trim() };
    })
    .filter((source) => source.url.length > 0);
};

export const env: EnvironmentConfig = {
  nodeEnv: process.env.NODE_ENV || 'development',
  port: Number(process.env.PORT || 8000),
  logLevel: process.env.LOG_LEVEL || 'info',
  database: {
    host: process.env.DB_HOST || '127.0.0.1',
    port: Number(process.env.DB_PORT || 5432),
    name: process.env.DB_NAME || 'autodeal',
    username: process.env.DB_USERNAME || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    adminDatabase: process.env.DB_ADMIN_DATABASE || 'postgres',
    ssl: process.env.DB_SSL === 'true',
    sslRejectUnauthorized: process.env.DB_SSL_REJECT_UNAUTHORIZED !== 'false',
    logging: process.env.DB_LOGGING === 'true',
  },
  rateLimit: {
    windowMs: Number(process.env.RATE_LIMIT_WINDOW || 15 * 60 * 1000),
    max: Number(process.env.RATE_LIMIT_MAX || 100),
  },
  llm: {
    baseURL: process.env.LLM_BASE_URL || 'http://localhost:11434',
    model: process.env.LLM_MODEL || 'llama3.1',
    timeout: Number(process.env.LLM_TIMEOUT || 60000),
  },
  openai: {
    apiKey: process.env.OPENAI_API_KEY,
    model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
  },
  market: {
    sources: parseMarketSources(process.env.MARKET_SOURCES),
    sourceTimeout: Number(process.env.MARKET_SOURCE_TIMEOUT || 10000),
    freshnessHours: Number(process.env.MARKET_FRESHNESS_HOURS || 24),
  },
  negotiation: {
    maxRounds: Number(process.env.NEGOTIATION_MAX_ROUNDS || 10),
    marginTarget: Number(process.env.NEGOTIATION_MARGIN_TARGET || 0.15),
    satisfactionPriority: Number(process.env.NEGOTIATION_SATISFACTION_PRIORITY || 0.7),
    budgetMin: Number(process.env.NEGOTIATION_BUDGET_MIN || 10000),
    budgetMax: Number(process.env.NEGOTIATION_BUDGET_MAX || 50000),
    selectionPolicy:
      process.env.OFFER_SELECTION_POLICY === 'highest_confidence' ? 'highest_confidence' : 'first',
    advisorTimeout: Number(process.env.ADVISOR_TIMEOUT || 30000),
    proposalTimeout: Number(process.env.PROPOSAL_TIMEOUT || 30000),
    historyLimit: Number(process.env.CONVERSATION_HISTORY_LIMIT || 20),
  },
  cors: {
    origin: process.env.CORS_ORIGIN
      ? process.env.CORS_ORIGIN.split(',').map((origin) => origin.trim())
      : '*',
    credentials: process.env.CORS_ORIGIN ? true : false,
  },
};

export default env;
