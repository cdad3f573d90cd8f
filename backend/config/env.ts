import dotenv from "dotenv";

dotenv.config();

type Env = Record<string, string | undefined>;

export interface OllamaSettings {
  host: string;
  detectionModel: string;
  explanationModel: string;
  requestTimeoutMs: number;
  probeTimeoutMs: number;
  temperature: number;
}

export interface AnalysisSettings {
  detectionModel: string;
  explanationModel: string;
  explanationConcurrency: number;
}

export interface KafkaSettings {
  clientId: string;
  brokers: [string, ...string[]];
  topic: string;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  mongoUri: string;
  redisUrl: string;
  kafka: KafkaSettings;
  cacheTtlSeconds: number;
  ollama: OllamaSettings;
  analysis: AnalysisSettings;
  maxCodeSizeKb: number;
}

const getEnv = (env: Env, key: string, fallback?: string): string => {
  const value = env[key] ?? fallback;
  if (value === undefined || value === "") {
    throw new Error(`Environment variable ${key} is required`);
  }
  return value;
};

const getNumber = (env: Env, key: string, fallback: number): number => {
  const raw = env[key];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${key} must be a number, got "${raw}"`);
  }
  return value;
};

const parseList = (value: string): string[] =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);

const parseBrokers = (value: string): [string, ...string[]] => {
  const [first, ...rest] = parseList(value);
  if (first === undefined) {
    throw new Error("Environment variable KAFKA_BROKERS must list at least one broker");
  }
  return [first, ...rest];
};

export const loadConfig = (env: Env = process.env): Readonly<AppConfig> => {
  const detectionModel = getEnv(env, "DETECTION_MODEL", "deepseek-coder-v2:latest");
  const explanationModel = getEnv(env, "EXPLANATION_MODEL", "llama3.1:8b");
  const explanationConcurrency = Math.max(1, Math.floor(getNumber(env, "EXPLANATION_CONCURRENCY", 2)));

  return Object.freeze({
    nodeEnv: env.NODE_ENV ?? "development",
    port: getNumber(env, "PORT", 3000),
    mongoUri: getEnv(env, "MONGO_URI", "mongodb://localhost:27017/contract-scanner"),
    redisUrl: getEnv(env, "REDIS_URL", "redis://localhost:6379"),
    kafka: {
      clientId: env.KAFKA_CLIENT_ID ?? "contract-scanner",
      brokers: parseBrokers(env.KAFKA_BROKERS ?? "kafka:9092"),
      topic: env.KAFKA_TOPIC ?? "contract-analysis-requests",
    },
    cacheTtlSeconds: getNumber(env, "CACHE_TTL_SECONDS", 600),
    ollama: {
      host: getEnv(env, "OLLAMA_HOST", "http://localhost:11434").replace(/\/+$/, ""),
      detectionModel,
      explanationModel,
      requestTimeoutMs: getNumber(env, "OLLAMA_TIMEOUT_MS", 300_000),
      probeTimeoutMs: getNumber(env, "OLLAMA_PROBE_TIMEOUT_MS", 5_000),
      temperature: getNumber(env, "OLLAMA_TEMPERATURE", 0.1),
    },
    analysis: {
      detectionModel,
      explanationModel,
      explanationConcurrency,
    },
    maxCodeSizeKb: getNumber(env, "MAX_CODE_SIZE_KB", 500),
  });
};

export default loadConfig;
