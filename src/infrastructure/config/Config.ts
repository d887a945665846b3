import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

export interface AppConfig {
  watcher: {
    inboxDir: string;
    processedDir: string;
    failedDir: string;
    logFile: string;
    pollIntervalMs: number;
    ownerId: string;
  };
  normalizer: {
    baseUrl: string;
    apiKey: string;
    model: string;
    timeoutMs: number;
  };
  store: {
    multipliersFile: string;
  };
  app: {
    port: number;
  };
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const NumericEnvSchema = z.object({
  POLL_INTERVAL_MS: positiveInt(30_000),
  NORMALIZER_TIMEOUT_MS: positiveInt(120_000),
  PORT: positiveInt(4000),
});

export const expandHome = (input: string): string =>
  input === '~' || input.startsWith('~/') ? path.join(os.homedir(), input.slice(1)) : input;

const documentsRoot = '~/Finances/Documents';

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const numeric = NumericEnvSchema.parse({
    POLL_INTERVAL_MS: env.POLL_INTERVAL_MS || undefined,
    NORMALIZER_TIMEOUT_MS: env.NORMALIZER_TIMEOUT_MS || undefined,
    PORT: env.PORT || undefined,
  });
  const ollamaBaseUrl = (env.OLLAMA_BASE_URL ?? 'http://localhost:11434').replace(/\/+$/, '');

  return {
    watcher: {
      inboxDir: expandHome(env.INBOX_DIR ?? `${documentsRoot}/Incoming`),
      processedDir: expandHome(env.PROCESSED_DIR ?? `${documentsRoot}/Processed`),
      failedDir: expandHome(env.FAILED_DIR ?? `${documentsRoot}/Failed`),
      logFile: expandHome(env.WATCHER_LOG_FILE ?? `${documentsRoot}/watcher_log.csv`),
      pollIntervalMs: numeric.POLL_INTERVAL_MS,
      ownerId: env.WATCHER_OWNER_ID ?? 'household',
    },
    normalizer: {
      baseUrl: env.NORMALIZER_BASE_URL ?? `${ollamaBaseUrl}/v1`,
      // Ollama ignores the key but the client requires one
      apiKey: env.NORMALIZER_API_KEY ?? 'ollama',
      model: env.NORMALIZER_MODEL ?? 'llama3',
      timeoutMs: numeric.NORMALIZER_TIMEOUT_MS,
    },
    store: {
      multipliersFile: env.MULTIPLIERS_FILE ?? 'config/multipliers.json',
    },
    app: {
      port: numeric.PORT,
    },
  };
};
