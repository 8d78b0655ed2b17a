import "dotenv/config";
import { isHex, size, type Hex } from "viem";
import type { MarketConfig } from "./types/config.js";
import { DEFAULT_COOLDOWN_SECONDS } from "./engine/cooldown.js";
import { parseAddress } from "./utils/validate.js";

const DEFAULT_MARKET_ADDRESS = "0x0000000000000000000000000000000000000001";

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function parseNonNegativeInt(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function parsePrivateKey(raw: string | undefined): Hex | null {
  if (!raw) return null;
  if (!isHex(raw) || size(raw) !== 32) {
    throw new Error("ORACLE_PRIVATE_KEY must be a 32-byte hex value");
  }
  return raw;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MarketConfig {
  return {
    marketAddress: parseAddress(env.MARKET_ADDRESS || DEFAULT_MARKET_ADDRESS, "MARKET_ADDRESS"),
    ownerAddress: parseAddress(requireEnv(env, "OWNER_ADDRESS"), "OWNER_ADDRESS"),
    cooldownSeconds: parseNonNegativeInt(
      "COOLDOWN_SECONDS",
      env.COOLDOWN_SECONDS || String(DEFAULT_COOLDOWN_SECONDS)
    ),
    oraclePrivateKey: parsePrivateKey(env.ORACLE_PRIVATE_KEY),
    logLevel: env.LOG_LEVEL || "info",
  };
}
