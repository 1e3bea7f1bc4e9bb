import { afterEach, beforeEach, vi } from "vitest";

const ENV_SNAPSHOT = { ...process.env };

beforeEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

afterEach(async () => {
  for (const key of Object.keys(process.env)) {
    if (!(key in ENV_SNAPSHOT)) {
      delete process.env[key];
    }
  }

  for (const [key, value] of Object.entries(ENV_SNAPSHOT)) {
    process.env[key] = value;
  }

  // a test's vi.doMock of these modules must not replace the real reset hooks
  vi.doUnmock("../../src/clients/lifecycle.js");
  vi.doUnmock("../../src/clients/openai.js");
  vi.doUnmock("../../src/pipeline.js");
  vi.doUnmock("../../src/observability/metrics.js");

  const [lifecycle, openai, pipeline, metrics] = await Promise.all([
    import("../../src/clients/lifecycle.js"),
    import("../../src/clients/openai.js"),
    import("../../src/pipeline.js"),
    import("../../src/observability/metrics.js")
  ]);
  lifecycle.resetClientLifecycleStateForTests();
  openai.resetOpenAIClientForTests();
  pipeline.resetPipelineForTests();
  metrics.resetMetrics();
});
