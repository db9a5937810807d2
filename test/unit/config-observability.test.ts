import { describe, expect, it, vi } from "vitest";
import { ConfigurationError, requireSetting } from "../../src/config/index.js";
import { loadEnvFile, parseDotEnvLine, parseEnv } from "../../src/config/env.js";
import {
  errorMessage,
  isLogLevelEnabled,
  logDebug,
  logError,
  logInfo,
  logWarn,
  parseLogLevel
} from "../../src/observability/logger.js";
import {
  getMetricsSnapshot,
  recordErrorRate,
  recordRetrievalLatency,
  recordStreamDuration,
  resetMetrics
} from "../../src/observability/metrics.js";

describe("config/env", () => {
  it("applies defaults for an empty environment", () => {
    const env = parseEnv({});

    expect(env).toEqual(
      expect.objectContaining({
        APP_MODE: "prod",
        OPENAI_ADVISOR_MODEL: "gpt-4.1",
        OPENAI_EMBEDDING_MODEL: "text-embedding-3-small",
        RETRIEVAL_TOP_K: 14,
        SEARCH_K_HEADROOM: 1,
        PRICE_LOWER_TOLERANCE: 1000,
        PRICE_UPPER_TOLERANCE: 2000
      })
    );
    expect(env.QDRANT_URL).toBeUndefined();
  });

  it("coerces numbers and trims optional settings", () => {
    const env = parseEnv({ RETRIEVAL_TOP_K: "20", QDRANT_URL: "  http://qdrant.test  ", QDRANT_API_KEY: "   " });

    expect(env.RETRIEVAL_TOP_K).toBe(20);
    expect(env.QDRANT_URL).toBe("http://qdrant.test");
    expect(env.QDRANT_API_KEY).toBeUndefined();
  });

  it("lists invalid settings", () => {
    expect(() => parseEnv({ RETRIEVAL_TOP_K: "0" })).toThrow(/^Invalid environment configuration:\n- RETRIEVAL_TOP_K: /);
  });

  it("parses dotenv lines", () => {
    expect(parseDotEnvLine('OPENAI_API_KEY="test-secret"')).toEqual(["OPENAI_API_KEY", "test-secret"]);
    expect(parseDotEnvLine(" QDRANT_URL = 'http://qdrant.test' ")).toEqual(["QDRANT_URL", "http://qdrant.test"]);
    expect(parseDotEnvLine("# comment")).toBeNull();
    expect(parseDotEnvLine("=value")).toBeNull();
    expect(parseDotEnvLine("NO_SEPARATOR")).toBeNull();
  });

  it("loads the first env file found without overriding the environment", () => {
    const processEnv: NodeJS.ProcessEnv = { APP_MODE: "local", OPENAI_API_KEY: "already-set" };
    const existsSync = vi.fn().mockImplementation((candidate: string) => candidate === "/srv/.env");
    const readFileSync = vi.fn().mockReturnValue("OPENAI_API_KEY=test-secret\nQDRANT_URL='http://qdrant.test'\n# note\n");

    const loaded = loadEnvFile({ cwd: "/srv", processEnv, existsSync, readFileSync });

    expect(loaded).toBe("/srv/.env");
    expect(existsSync.mock.calls.map(([candidate]) => candidate)).toEqual([
      "/srv/.env.local",
      "/srv/.env.local",
      "/srv/.env"
    ]);
    expect(processEnv).toEqual({
      APP_MODE: "local",
      OPENAI_API_KEY: "already-set",
      QDRANT_URL: "http://qdrant.test"
    });
  });

  it("requires settings that the retriever depends on", () => {
    expect(requireSetting("general", "QDRANT_COLLECTION_GENERAL_TRACK")).toBe("general");
    expect(() => requireSetting("  ", "PARENT_DOCUMENTS_FILE")).toThrow(
      new ConfigurationError("Configuration error: PARENT_DOCUMENTS_FILE is missing.")
    );
  });
});

describe("observability/logger", () => {
  it("writes one JSON line with correlation fields", () => {
    vi.stubEnv("LOG_LEVEL", "info");
    const info = vi.spyOn(console, "info").mockImplementation(() => {});

    logInfo("advisor.turn.start", { runId: "run-1", conversationId: "conv-1", username: "sam" }, { excluded_count: 2 });

    expect(info).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(info.mock.calls[0]?.[0]))).toEqual({
      ts: expect.any(String),
      level: "info",
      event: "advisor.turn.start",
      run_id: "run-1",
      conversation_id: "conv-1",
      username: "sam",
      excluded_count: 2
    });
  });

  it("filters by level and routes warnings and errors to their streams", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    logDebug("debug.event", {});
    logInfo("info.event", {});
    logWarn("warn.event", {});
    logError("error.event", {});

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0]?.[0]))).toEqual(
      expect.objectContaining({ level: "warn", event: "warn.event", run_id: null, username: null })
    );
    expect(isLogLevelEnabled("error")).toBe(true);
    expect(isLogLevelEnabled("info")).toBe(false);
  });

  it("normalizes levels and error messages", () => {
    expect(parseLogLevel(" WARN ")).toBe("warn");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(new Error("  "))).toBe("unknown error");
    expect(errorMessage("not an error", "fallback")).toBe("fallback");
  });
});

describe("observability/metrics", () => {
  it("aggregates latencies and error counts", () => {
    recordStreamDuration(100);
    recordStreamDuration(300);
    recordRetrievalLatency(-5);
    recordErrorRate("advisor.classify");
    recordErrorRate("advisor.classify");

    expect(getMetricsSnapshot()).toEqual({
      stream_duration: { count: 2, avgMs: 200, minMs: 100, maxMs: 300 },
      retrieval_latency: { count: 1, avgMs: 0, minMs: 0, maxMs: 0 },
      model_latency: {},
      model_usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      error_rates: { "advisor.classify": 2 }
    });

    resetMetrics();
    expect(getMetricsSnapshot()).toEqual(
      expect.objectContaining({ stream_duration: { count: 0, avgMs: 0, minMs: 0, maxMs: 0 }, error_rates: {} })
    );
  });
});
