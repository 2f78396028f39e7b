import { describe, it, expect, vi, afterEach } from "vitest";

import {
  envUtils,
  initializeEnv,
  loadEnv,
  screeningConfigFromEnv,
  validateEnv,
} from "../../config/env";
import { ConfigurationError } from "../../src/utils/errors";
import { silentLogger } from "../helpers/fixtures";

const VALID_SOURCE = {
  NODE_ENV: "test",
  POLYGON_RPC_URL: "https://rpc.example.com",
  POLYGONSCAN_API_KEY: "test-secret",
  POLYMARKET_SESSION_TOKEN: "test-session",
};

function configurationProblems(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.problems;
    }
    throw error;
  }
  return [];
}

describe("Environment Configuration", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("isValidUrl", () => {
    it("should return true for valid HTTP URLs", () => {
      expect(envUtils.isValidUrl("https://example.com")).toBe(true);
      expect(envUtils.isValidUrl("https://example.com:3000/path?query=value")).toBe(true);
    });

    it("should return false for invalid URLs", () => {
      expect(envUtils.isValidUrl("not-a-url")).toBe(false);
      expect(envUtils.isValidUrl("")).toBe(false);
      expect(envUtils.isValidUrl("example.com")).toBe(false);
    });
  });

  describe("redactSecret", () => {
    it("should keep only the ends of long secrets", () => {
      expect(envUtils.redactSecret("test-secret-value")).toBe("test****alue");
    });

    it("should hide short secrets entirely", () => {
      expect(envUtils.redactSecret("short")).toBe("****");
      expect(envUtils.redactSecret(undefined)).toBe("(not set)");
    });
  });

  describe("typed getters", () => {
    it("should parse numbers, integers, booleans and lists", () => {
      const source = { N: "0.25", I: "12", B: "TRUE", L: " a, b ,,c " };

      expect(envUtils.getEnvVarAsNumber(source, "N")).toBe(0.25);
      expect(envUtils.getEnvVarAsInteger(source, "I")).toBe(12);
      expect(envUtils.getEnvVarAsBoolean(source, "B")).toBe(true);
      expect(envUtils.getEnvVarAsBoolean({ B: "no" }, "B")).toBe(false);
      expect(envUtils.getEnvVarAsList(source, "L")).toEqual(["a", "b", "c"]);
    });

    it("should treat blank values as unset", () => {
      expect(envUtils.getEnvVarAsNumber({ N: "  " }, "N")).toBeUndefined();
    });

    it("should reject malformed values", () => {
      expect(() => envUtils.getEnvVarAsNumber({ N: "ten" }, "N")).toThrow(ConfigurationError);
      expect(() => envUtils.getEnvVarAsInteger({ I: "1.5" }, "I")).toThrow(
        "Environment variable I must be an integer, got: 1.5"
      );
    });
  });

  describe("loadEnv", () => {
    it("should apply defaults", () => {
      const env = loadEnv({});

      expect(env.NODE_ENV).toBe("development");
      expect(env.DATA_API_URL).toBe("https://data-api.polymarket.com");
      expect(env.GAMMA_API_URL).toBe("https://gamma-api.polymarket.com");
      expect(env.POLYGONSCAN_API_URL).toBe("https://api.etherscan.io/v2/api");
      expect(env.POLYGON_RPC_FALLBACK_URLS).toEqual([]);
      expect(env.MAX_TRADES).toBe(5000);
      expect(env.TRADE_PAGE_SIZE).toBe(500);
    });

    it("should read fallback RPC URLs", () => {
      const env = loadEnv({ POLYGON_RPC_FALLBACK_URLS: "https://a.example.com, https://b.example.com" });

      expect(env.POLYGON_RPC_FALLBACK_URLS).toEqual(["https://a.example.com", "https://b.example.com"]);
    });

    it("should reject invalid URLs", () => {
      expect(() => loadEnv({ DATA_API_URL: "data-api" })).toThrow(ConfigurationError);
      expect(() => loadEnv({ POLYGON_RPC_FALLBACK_URLS: "nope" })).toThrow(ConfigurationError);
    });
  });

  describe("validateEnv", () => {
    it("should require the RPC URL and explorer key", () => {
      const result = validateEnv(loadEnv({}));

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        "POLYGON_RPC_URL is required for historical balance lookups",
        "POLYGONSCAN_API_KEY is required to resolve trade timestamps to blocks",
      ]);
    });

    it("should warn about a missing session token", () => {
      const { POLYMARKET_SESSION_TOKEN: _token, ...withoutSession } = VALID_SOURCE;

      const result = validateEnv(loadEnv(withoutSession));

      expect(result.valid).toBe(true);
      expect(result.warnings).toHaveLength(1);
    });

    it("should reject non-positive fetch limits", () => {
      const result = validateEnv(loadEnv({ ...VALID_SOURCE, MAX_TRADES: "0" }));

      expect(result.errors).toEqual(["MAX_TRADES must be positive, got: 0"]);
    });
  });

  describe("initializeEnv", () => {
    it("should return the environment when valid", () => {
      expect(initializeEnv(VALID_SOURCE, silentLogger).POLYGONSCAN_API_KEY).toBe("test-secret");
    });

    it("should list every problem", () => {
      expect(configurationProblems(() => initializeEnv({ NODE_ENV: "test" }, silentLogger))).toHaveLength(2);
    });

    it("should log warnings", () => {
      const warn = vi.spyOn(silentLogger, "warn");

      initializeEnv({ ...VALID_SOURCE, POLYMARKET_SESSION_TOKEN: "" }, silentLogger);

      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe("screeningConfigFromEnv", () => {
    it("should map variables onto the screening configuration", () => {
      const config = screeningConfigFromEnv({
        LOOKBACK_DAYS: "3",
        MIN_BET_AMOUNT: "2500",
        MIN_CONVICTION_RATIO: "0.2",
        MIN_CLUSTER_SIZE: "4",
        REQUIRE_FRESH_WALLET: "true",
        INSIDER_RISK_KEYWORDS: "FDA, approval",
      });

      expect(config).toMatchObject({
        lookbackDays: 3,
        minBetAmount: 2500,
        convictionThreshold: 0.2,
        minClusterSize: 4,
        requireFreshWallet: true,
        insiderRiskKeywords: ["fda", "approval"],
      });
    });

    it("should enable the prior-trade check", () => {
      expect(screeningConfigFromEnv({ CHECK_PRIOR_TRADES: "true" }).checkPriorTrades).toBe(true);
      expect(screeningConfigFromEnv({}).checkPriorTrades).toBe(false);
    });

    it("should let overrides win over the environment", () => {
      expect(screeningConfigFromEnv({ LOOKBACK_DAYS: "3" }, { lookbackDays: 14 }).lookbackDays).toBe(14);
    });

    it("should reject out-of-range thresholds", () => {
      expect(configurationProblems(() => screeningConfigFromEnv({ MIN_CONVICTION_RATIO: "1.5" }))).toEqual([
        "convictionThreshold must be in (0, 1], got: 1.5",
      ]);
    });
  });
});
