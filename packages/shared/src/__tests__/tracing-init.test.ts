import {
  AlwaysOffSampler,
  AlwaysOnSampler,
  ParentBasedSampler,
} from "@opentelemetry/sdk-trace-node"
import { afterEach, describe, expect, it } from "vitest"

import {
  createSampler,
  DEFAULT_TRACING_CONFIG,
  initTracing,
  isTracingActive,
  shutdownTracing,
  tracingResourceAttributes,
} from "../tracing/sdk.js"

// ──────────────────────────────────────────────────
// Resource and sampling
// ──────────────────────────────────────────────────

describe("tracingResourceAttributes", () => {
  it("names the service, its version and the deployment", () => {
    expect(tracingResourceAttributes({ ...DEFAULT_TRACING_CONFIG, environment: "staging" })).toEqual({
      "service.name": "aether-control-plane",
      "service.version": "0.1.0",
      "deployment.environment.name": "staging",
    })
  })
})

describe("createSampler", () => {
  it("keeps everything at rate 1", () => {
    expect(createSampler(1)).toBeInstanceOf(AlwaysOnSampler)
  })

  it("drops everything at rate 0", () => {
    expect(createSampler(0)).toBeInstanceOf(AlwaysOffSampler)
  })

  it("samples roots by ratio in between", () => {
    expect(createSampler(0.25)).toBeInstanceOf(ParentBasedSampler)
  })
})

// ──────────────────────────────────────────────────
// Lifecycle
// ──────────────────────────────────────────────────

describe("initTracing", () => {
  afterEach(async () => {
    await shutdownTracing()
  })

  it("stays inactive when disabled", () => {
    expect(initTracing({ enabled: false })).toBe(false)
    expect(isTracingActive()).toBe(false)
  })

  it("stays inactive with the none exporter", () => {
    expect(initTracing({ exporterType: "none" })).toBe(false)
    expect(isTracingActive()).toBe(false)
  })

  it("starts with the console exporter", () => {
    expect(initTracing({ exporterType: "console", sampleRate: 0.5 })).toBe(true)
    expect(isTracingActive()).toBe(true)
  })

  it("ignores a second call while running", () => {
    initTracing({ exporterType: "console" })
    expect(initTracing({ exporterType: "otlp" })).toBe(true)
  })
})

describe("shutdownTracing", () => {
  it("is a no-op without a running SDK", async () => {
    await expect(shutdownTracing()).resolves.toBeUndefined()
  })

  it("allows a restart after shutdown", async () => {
    initTracing({ exporterType: "console" })
    await shutdownTracing()
    expect(isTracingActive()).toBe(false)

    expect(initTracing({ exporterType: "console" })).toBe(true)
    await shutdownTracing()
  })
})
