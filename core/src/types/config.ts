import type { Address, Hex } from "viem";

export interface MarketConfig {
  marketAddress: Address;
  ownerAddress: Address;
  cooldownSeconds: number;
  oraclePrivateKey: Hex | null;
  logLevel: string;
}
