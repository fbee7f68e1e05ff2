import { describe, it, expect, vi } from "vitest";
import type { Notify } from "@/types/payment";
import { GatewayOperationError } from "@/utils/errors";
import { DEFAULT_POLL_POLICY, pollTradeState, type PollPolicy } from "./poller";

function recordingPolicy(maxAttempts = 5): PollPolicy & { waits: number[] } {
  const waits: number[] = [];
  return {
    waits,
    maxAttempts,
    delay: DEFAULT_POLL_POLICY.delay,
    sleep: async (ms) => {
      waits.push(ms);
    },
  };
}

function tradeState(tradeStatus: string): Notify {
  return { code: "10000", tradeNo: "2024X", tradeStatus, raw: {} };
}

describe("DEFAULT_POLL_POLICY", () => {
  it("queries five times, five seconds apart", () => {
    expect(DEFAULT_POLL_POLICY.maxAttempts).toBe(5);
    expect(DEFAULT_POLL_POLICY.delay(2)).toBe(5000);
  });
});

describe("pollTradeState", () => {
  it("stops on the third attempt after waiting ten seconds in total", async () => {
    const policy = recordingPolicy();
    const query = vi
      .fn<() => Promise<Notify>>()
      .mockResolvedValueOnce(tradeState("WAIT_BUYER_PAY"))
      .mockResolvedValueOnce(tradeState("WAIT_BUYER_PAY"))
      .mockResolvedValueOnce(tradeState("TRADE_SUCCESS"));

    const result = await pollTradeState(query, policy);

    expect(result).toEqual({ status: "succeeded", notify: tradeState("TRADE_SUCCESS"), attempts: 3 });
    expect(query).toHaveBeenCalledTimes(3);
    expect(policy.waits).toEqual([5000, 5000]);
    expect(policy.waits.reduce((total, ms) => total + ms, 0)).toBe(10000);
  });

  it("treats TRADE_FINISHED as paid", async () => {
    const result = await pollTradeState(async () => tradeState("TRADE_FINISHED"), recordingPolicy());
    expect(result.status).toBe("succeeded");
    expect(result.attempts).toBe(1);
  });

  it("times out after the last attempt and keeps the last answer", async () => {
    const policy = recordingPolicy();
    const query = vi.fn<() => Promise<Notify>>().mockResolvedValue(tradeState("WAIT_BUYER_PAY"));

    const result = await pollTradeState(query, policy);

    expect(result).toEqual({ status: "timedOut", attempts: 5, lastNotify: tradeState("WAIT_BUYER_PAY") });
    expect(query).toHaveBeenCalledTimes(5);
    expect(policy.waits).toEqual([5000, 5000, 5000, 5000]);
  });

  it("stops at the first provider error instead of counting it as not yet paid", async () => {
    const policy = recordingPolicy();
    const failure = new GatewayOperationError("參數無效", { code: "40004", subCode: "ACQ.INVALID_PARAMETER", raw: {} });
    const query = vi
      .fn<() => Promise<Notify>>()
      .mockResolvedValueOnce(tradeState("WAIT_BUYER_PAY"))
      .mockRejectedValueOnce(failure)
      .mockResolvedValueOnce(tradeState("TRADE_SUCCESS"));

    await expect(pollTradeState(query, policy)).rejects.toBe(failure);
    expect(query).toHaveBeenCalledTimes(2);
    expect(policy.waits).toEqual([5000]);
  });

  it("lets transport errors through", async () => {
    const failure = new Error("ECONNRESET");
    const query = vi.fn<() => Promise<Notify>>().mockRejectedValue(failure);

    await expect(pollTradeState(query, recordingPolicy())).rejects.toBe(failure);
    expect(query).toHaveBeenCalledTimes(1);
  });
});
