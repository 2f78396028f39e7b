/**
 * Tests for the Polygon RPC client
 */
import { describe, it, expect, beforeEach, vi } from "vitest";

import {
  POLYGON_USDC_ADDRESS,
  PolygonClient,
  PolygonClientError,
  createPolygonClient,
} from "../../../src/api/chain";
import { silentLogger } from "../../helpers/fixtures";

vi.mock("viem", async () => {
  const actual = await vi.importActual<typeof import("viem")>("viem");
  return {
    ...actual,
    createPublicClient: vi.fn(),
    http: vi.fn(() => "mock-transport"),
  };
});

import { createPublicClient, http } from "viem";
const mockCreatePublicClient = vi.mocked(createPublicClient);

const HOLDER = "0x1111111111111111111111111111111111111111";
const CHECKSUMMED_HOLDER = "0x1111111111111111111111111111111111111111";

describe("PolygonClient", () => {
  let mockClient: {
    getBlockNumber: ReturnType<typeof vi.fn>;
    getTransactionCount: ReturnType<typeof vi.fn>;
    readContract: ReturnType<typeof vi.fn>;
  };

  function createClient(urls: string[] = ["https://rpc-1.example.com"]): PolygonClient {
    return new PolygonClient({
      rpcEndpoints: urls.map((url, index) => ({ url, name: `rpc-${index + 1}`, priority: index + 1 })),
      maxRetries: 2,
      retryDelay: 0,
      logger: silentLogger,
    });
  }

  beforeEach(() => {
    vi.clearAllMocks();
    mockClient = {
      getBlockNumber: vi.fn().mockResolvedValue(57000000n),
      getTransactionCount: vi.fn().mockResolvedValue(3),
      readContract: vi.fn().mockResolvedValue(1500000000n),
    };
    mockCreatePublicClient.mockReturnValue(mockClient as unknown as ReturnType<typeof createPublicClient>);
  });

  it("requires at least one endpoint", () => {
    expect(() => new PolygonClient({ logger: silentLogger })).toThrow(PolygonClientError);
    expect(() => createPolygonClient({ rpcEndpoints: [{ url: "https://x.example.com", enabled: false }] })).toThrow(
      "No RPC endpoints configured"
    );
  });

  it("creates the viem client lazily for the highest-priority endpoint", async () => {
    const client = new PolygonClient({
      rpcEndpoints: [
        { url: "https://backup.example.com", priority: 5 },
        { url: "https://primary.example.com", priority: 1 },
      ],
      logger: silentLogger,
    });
    expect(mockCreatePublicClient).not.toHaveBeenCalled();

    await client.getBlockNumber();
    await client.getBlockNumber();

    expect(mockCreatePublicClient).toHaveBeenCalledTimes(1);
    expect(http).toHaveBeenCalledWith("https://primary.example.com", { timeout: 30000 });
    expect(client.getActiveEndpoint()?.url).toBe("https://primary.example.com");
  });

  it("reads an ERC-20 balance at a block", async () => {
    const client = createClient();

    const balance = await client.getTokenBalance(POLYGON_USDC_ADDRESS, HOLDER, 100n);

    expect(balance).toBe(1500000000n);
    expect(mockClient.readContract).toHaveBeenCalledWith(
      expect.objectContaining({
        address: POLYGON_USDC_ADDRESS,
        functionName: "balanceOf",
        args: [CHECKSUMMED_HOLDER],
        blockNumber: 100n,
      })
    );
  });

  it("reads the transaction count at a block", async () => {
    const client = createClient();

    expect(await client.getTransactionCount(HOLDER, 99n)).toBe(3);
    expect(mockClient.getTransactionCount).toHaveBeenCalledWith({ address: CHECKSUMMED_HOLDER, blockNumber: 99n });
  });

  it("rejects invalid addresses and blocks without calling the node", async () => {
    const client = createClient();

    await expect(client.getTransactionCount("0x123")).rejects.toMatchObject({ code: "INVALID_ADDRESS" });
    await expect(client.getTransactionCount(HOLDER, -1n)).rejects.toMatchObject({ code: "INVALID_BLOCK" });
    expect(mockClient.getTransactionCount).not.toHaveBeenCalled();
  });

  it("retries transient failures", async () => {
    const client = createClient();
    mockClient.getBlockNumber.mockRejectedValueOnce(new Error("socket hang up"));

    expect(await client.getBlockNumber()).toBe(57000000n);
    expect(client.getStats()).toMatchObject({ totalRequests: 1, successfulRequests: 1, retries: 1 });
  });

  it("switches endpoints on rate limiting", async () => {
    const client = createClient(["https://rpc-1.example.com", "https://rpc-2.example.com"]);
    mockClient.getBlockNumber.mockRejectedValueOnce(new Error("429 Too Many Requests"));

    await client.getBlockNumber();

    expect(client.getActiveEndpoint()?.url).toBe("https://rpc-2.example.com");
    expect(client.getStats().endpointSwitches).toBe(1);
    expect(mockCreatePublicClient).toHaveBeenCalledTimes(2);
  });

  it("gives up after the configured retries", async () => {
    const client = createClient();
    mockClient.getBlockNumber.mockRejectedValue(new Error("connection refused"));

    await expect(client.getBlockNumber()).rejects.toMatchObject({ code: "ALL_ENDPOINTS_FAILED" });
    expect(mockClient.getBlockNumber).toHaveBeenCalledTimes(3);
    expect(client.getStats().failedRequests).toBe(1);
  });
});
