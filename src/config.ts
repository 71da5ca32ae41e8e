import dotenv from 'dotenv';

dotenv.config();

export interface AppConfig {
  port: number;
  /** 0 disables the search bound */
  searchMaxSteps: number;
  /** undefined means every excluding history record applies */
  historyLookbackYears?: number;
}

const DEFAULT_PORT = 3000;
const DEFAULT_SEARCH_MAX_STEPS = 1_000_000;
const DEFAULT_HISTORY_LOOKBACK_YEARS = 2;

function readCount(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    console.warn(`Ignoring invalid ${key}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const lookbackRaw = env.HISTORY_LOOKBACK_YEARS;
  return {
    port: readCount(env, 'PORT', DEFAULT_PORT),
    searchMaxSteps: readCount(env, 'SEARCH_MAX_STEPS', DEFAULT_SEARCH_MAX_STEPS),
    historyLookbackYears:
      lookbackRaw !== undefined && lookbackRaw.trim() === ''
        ? undefined
        : readCount(env, 'HISTORY_LOOKBACK_YEARS', DEFAULT_HISTORY_LOOKBACK_YEARS),
  };
}
