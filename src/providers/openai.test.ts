import { describe, it, expect } from "vitest";
import { classifyProviderError } from "./openai";
import {
  ProviderQuotaExceededError,
  ProviderUnavailableError,
  RateLimitedError,
  SupersededError,
} from "../errors";

function apiError(message: string, extra: Record<string, unknown>): Error {
  return Object.assign(new Error(message), extra);
}

describe("classifyProviderError", () => {
  it("treats an exhausted quota as terminal even when sent as a 429", () => {
    const err = classifyProviderError(apiError("You exceeded your quota", { status: 429, code: "insufficient_quota" }));
    expect(err).toBeInstanceOf(ProviderQuotaExceededError);
  });

  it("maps 429 to RateLimited and reads retry-after in seconds", () => {
    const plain = classifyProviderError(apiError("slow down", { status: 429, headers: { "retry-after": "2" } }));
    expect(plain).toBeInstanceOf(RateLimitedError);
    expect(plain).toMatchObject({ retryAfterMs: 2000 });

    const fetchHeaders = classifyProviderError(
      apiError("slow down", { status: 429, headers: new Headers({ "retry-after": "1.5" }) }),
    );
    expect(fetchHeaders).toMatchObject({ retryAfterMs: 1500 });

    const missing = classifyProviderError(apiError("slow down", { status: 429 }));
    expect(missing).toMatchObject({ retryAfterMs: undefined });
  });

  it("maps server, credential and network failures to ProviderUnavailable", () => {
    expect(classifyProviderError(apiError("bad gateway", { status: 502 }))).toBeInstanceOf(ProviderUnavailableError);
    expect(classifyProviderError(apiError("socket hang up", { code: "ECONNRESET" }))).toBeInstanceOf(
      ProviderUnavailableError,
    );
    expect(classifyProviderError(apiError("Connection error.", { name: "APIConnectionError" }))).toBeInstanceOf(
      ProviderUnavailableError,
    );
    const auth = classifyProviderError(apiError("Incorrect API key provided", { status: 401 }));
    expect(auth).toBeInstanceOf(ProviderUnavailableError);
    expect(auth).toMatchObject({ message: "Provider rejected the credentials: Incorrect API key provided" });
  });

  it("passes other errors through unchanged", () => {
    const badRequest = apiError("maximum context length exceeded", { status: 400 });
    expect(classifyProviderError(badRequest)).toBe(badRequest);
    const superseded = new SupersededError("ask");
    expect(classifyProviderError(superseded)).toBe(superseded);
  });
});
