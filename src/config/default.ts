import dotenv from 'dotenv';
import { SCANNER_CONFIG, DEFAULT_RISK } from './constants';

dotenv.config();

export type DefaultConfig = {
  SUPABASE_URL: string;
  SUPABASE_KEY: string;
  CONFIG_FILE: string;
  DEXSCREENER_URL: string;
  RUGCHECK_URL: string;
  FAKE_VOLUME_URL: string;
  TELEGRAM_TOKEN: string;
  TELEGRAM_CHAT_ID: string;
  TRADER_BOT: string;
  CHAINS: string[];
  WATCH_PAIRS: WatchedPair[];
  SCAN_INTERVAL_MS: number;
  PAIR_DELAY_MS: number;
  POSITION_FRACTION: number;
  PORTFOLIO_VALUE_USD: number;
  RISK_FREE_RATE: number;
  TRADE_FEE_RATE: number;
  ENV: 'dev' | 'prod';
};

export interface WatchedPair {
  chainId: string;
  pairAddress: string;
}

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function listFromEnv(name: string, fallback: readonly string[]): string[] {
  const raw = process.env[name];
  if (!raw) return [...fallback];
  return raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

/**
 * WATCH_PAIRS=ethereum:0xabc,bsc:0xdef
 */
export function parseWatchPairs(raw: string | undefined): WatchedPair[] {
  if (!raw) return [];
  const pairs: WatchedPair[] = [];
  for (const entry of raw.split(',')) {
    const [chainId, pairAddress] = entry.trim().split(':');
    if (chainId && pairAddress) {
      pairs.push({ chainId, pairAddress });
    }
  }
  return pairs;
}

export const DEFAULT_CONFIG: DefaultConfig = {
  SUPABASE_URL: process.env.SUPABASE_URL || "",
  SUPABASE_KEY: process.env.SUPABASE_SERVICE_ROLE_KEY || process.env.SUPABASE_KEY || "",
  CONFIG_FILE: process.env.CONFIG_FILE || "config.json",
  DEXSCREENER_URL: process.env.DEXSCREENER_URL || "https://api.dexscreener.com/latest/dex/pairs",
  RUGCHECK_URL: process.env.RUGCHECK_URL || "https://rugcheck.xyz/api/check",
  FAKE_VOLUME_URL: process.env.FAKE_VOLUME_URL || "https://api.pocketuniverse.app/v1/check_volume",
  TELEGRAM_TOKEN: process.env.TELEGRAM_TOKEN || "",
  TELEGRAM_CHAT_ID: process.env.TELEGRAM_CHAT_ID || "",
  TRADER_BOT: process.env.TRADER_BOT || "ToxiSolanaBot",
  CHAINS: listFromEnv('CHAINS', SCANNER_CONFIG.CHAINS),
  WATCH_PAIRS: parseWatchPairs(process.env.WATCH_PAIRS),
  SCAN_INTERVAL_MS: numberFromEnv('SCAN_INTERVAL_MS', SCANNER_CONFIG.SCAN_INTERVAL_MS),
  PAIR_DELAY_MS: numberFromEnv('PAIR_DELAY_MS', SCANNER_CONFIG.PAIR_DELAY_MS),
  POSITION_FRACTION: numberFromEnv('POSITION_FRACTION', DEFAULT_RISK.positionFraction),
  PORTFOLIO_VALUE_USD: numberFromEnv('PORTFOLIO_VALUE_USD', DEFAULT_RISK.portfolioValue),
  RISK_FREE_RATE: numberFromEnv('RISK_FREE_RATE', DEFAULT_RISK.riskFreeRate),
  TRADE_FEE_RATE: numberFromEnv('TRADE_FEE_RATE', 0),
  ENV: process.env.ENV === 'prod' ? 'prod' : 'dev',
};
