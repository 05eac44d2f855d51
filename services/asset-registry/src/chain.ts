import { JsonRpcProvider } from "ethers";
import type { ChainStatusResponse } from "@asset-ledger/shared";

/**
 * Supplies the sequence marker stamped on assets, compliance records and
 * events. Ordering and finality belong to the chain; this service only reads.
 */
export interface HeightSource {
  current(): Promise<number>;
  status(): Promise<ChainStatusResponse>;
  close(): void;
}

export interface BlockNumberProvider {
  getBlockNumber(): Promise<number>;
  destroy(): void;
}

export class ChainHeightSource implements HeightSource {
  private lastSeen = 0;

  constructor(
    private readonly provider: BlockNumberProvider,
    private readonly rpcUrl?: string,
  ) {}

  // Never goes backwards, even if a lagging node answers after a newer one.
  async current(): Promise<number> {
    const blockNumber = await this.provider.getBlockNumber();
    this.lastSeen = Math.max(this.lastSeen, blockNumber);
    return this.lastSeen;
  }

  async status(): Promise<ChainStatusResponse> {
    try {
      return {
        source: "chain",
        rpcUrl: this.rpcUrl,
        latestHeight: await this.provider.getBlockNumber(),
      };
    } catch (error) {
      return {
        source: "chain",
        rpcUrl: this.rpcUrl,
        error: error instanceof Error ? error.message : "unknown_error",
      };
    }
  }

  close(): void {
    this.provider.destroy();
  }
}

/** Advances by one per transition, resuming from the highest height already logged. */
export class LocalHeightSource implements HeightSource {
  constructor(private height: number) {}

  async current(): Promise<number> {
    this.height += 1;
    return this.height;
  }

  async status(): Promise<ChainStatusResponse> {
    return { source: "local", latestHeight: this.height };
  }

  close(): void {}
}

export function buildHeightSourceFromEnv(startHeight: number): HeightSource {
  const rpcUrl = process.env.CHAIN_RPC_URL;
  if (!rpcUrl) return new LocalHeightSource(startHeight);
  return new ChainHeightSource(new JsonRpcProvider(rpcUrl), rpcUrl);
}
