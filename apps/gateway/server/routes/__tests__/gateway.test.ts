import { describe, expect, it } from "vitest";

import { parseProviderRoute } from "../gateway.js";

describe("parseProviderRoute", () => {
  it("reads a project and provider", () => {
    expect(parseProviderRoute("/api/v1/gateway/demo/openai/chat/completions")).toEqual({
      projectName: "demo",
      provider: "openai",
      path: "/chat/completions"
    });
  });

  it("reads a provider without a project", () => {
    expect(parseProviderRoute("/api/v1/gateway/anthropic/v1/messages")).toEqual({
      provider: "anthropic",
      path: "/v1/messages"
    });
  });

  it("treats a first segment naming a provider as the provider", () => {
    expect(parseProviderRoute("/api/v1/gateway/gemini/openai/x")).toEqual({ provider: "gemini", path: "/openai/x" });
  });

  it("decodes the project segment", () => {
    expect(parseProviderRoute("/api/v1/gateway/my%20project/openai/chat/completions")?.projectName).toBe("my project");
  });

  it("rejects unknown providers and foreign paths", () => {
    expect(parseProviderRoute("/api/v1/gateway/demo/mistral/chat")).toBeNull();
    expect(parseProviderRoute("/api/v1/gateway/")).toBeNull();
    expect(parseProviderRoute("/api/health")).toBeNull();
  });
});
