// tests/ensemble/model-client.test.ts — Retry, backoff, error mapping and rolling stats

import { describe, it, expect, vi } from "vitest"
import { EndpointError } from "../../src/errors.js"
import { loadConfig } from "../../src/config.js"
import { ModelClient, createModelClients, extractText } from "../../src/ensemble/model-client.js"

const ENDPOINT = { name: "llama3_8b", url: "http://llama.test/generate" }

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } })
}

/** Clock advancing 10ms on every read. */
function steppingClock() {
  let t = 0
  return () => (t += 10)
}

describe("extractText", () => {
  it("prefers a non-empty text field", () => {
    expect(extractText({ text: "TRADE: BTC long", response: "other" })).toBe("TRADE: BTC long")
  })

  it("falls back to response when text is empty or missing", () => {
    expect(extractText({ text: "", response: "PAPER: x" })).toBe("PAPER: x")
    expect(extractText({ response: "PAPER: y" })).toBe("PAPER: y")
    expect(extractText({ text: 3, response: "r" })).toBe("r")
  })

  it("accepts an empty text when nothing better is present", () => {
    expect(extractText({ text: "" })).toBe("")
  })

  it("returns null when no string field is present", () => {
    expect(extractText({ response: 5 })).toBeNull()
    expect(extractText({})).toBeNull()
    expect(extractText("plain")).toBeNull()
    expect(extractText(null)).toBeNull()
  })
})

describe("ModelClient.generate", () => {
  it("posts the prompt and round id as JSON", async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse({ text: "ok" }))
    const client = new ModelClient(ENDPOINT, {}, { fetch: fetchFn, sleep: async () => {} })

    const result = await client.generate("the prompt", "round_1_0001")

    expect(result.text).toBe("ok")
    const [url, init] = fetchFn.mock.calls[0]
    expect(url).toBe("http://llama.test/generate")
    expect(init?.method).toBe("POST")
    expect(init?.body).toBe(JSON.stringify({ prompt: "the prompt", round_id: "round_1_0001" }))
  })

  it("retries with growing backoff and counts every attempt", async () => {
    const sleeps: number[] = []
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse({ text: "ok" }))
    fetchFn
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(new Response("overloaded", { status: 503 }))

    const client = new ModelClient(
      ENDPOINT,
      { maxRetries: 3, retryBackoff: 1.5 },
      { fetch: fetchFn, sleep: async (ms) => { sleeps.push(ms) }, clock: steppingClock() },
    )

    const result = await client.generate("p", "r")

    expect(result).toEqual({ text: "ok", latency_ms: 10 })
    expect(sleeps).toEqual([1500, 2250])
    expect(client.getStats()).toEqual({
      total_calls: 3,
      successful_calls: 1,
      error_count: 2,
      avg_latency_ms: 10,
    })
  })

  it("throws the last error once retries are exhausted", async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response("boom", { status: 500 }))
    const client = new ModelClient(ENDPOINT, { maxRetries: 2 }, { fetch: fetchFn, sleep: async () => {} })

    const err = await client.generate("p", "r").catch((e: unknown) => e)

    expect(err).toBeInstanceOf(EndpointError)
    expect(err).toMatchObject({ code: "http_status", statusCode: 500, message: "HTTP 500: boom", endpoint: "llama3_8b" })
    expect(fetchFn).toHaveBeenCalledTimes(3)
    expect(client.getStats()).toMatchObject({ total_calls: 3, successful_calls: 0, error_count: 3 })
  })

  it("maps transport failures to network_error", async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError("fetch failed")
    })
    const client = new ModelClient(ENDPOINT, { maxRetries: 0 }, { fetch: fetchFn })

    await expect(client.generate("p", "r")).rejects.toMatchObject({ code: "network_error", message: "fetch failed" })
  })

  it("maps a non-JSON body to malformed_response", async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response("<html>"))
    const client = new ModelClient(ENDPOINT, { maxRetries: 0 }, { fetch: fetchFn })

    await expect(client.generate("p", "r")).rejects.toMatchObject({
      code: "malformed_response",
      message: "response body is not valid JSON",
    })
  })

  it("maps a body without text fields to malformed_response", async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse({ output: "x" }))
    const client = new ModelClient(ENDPOINT, { maxRetries: 0 }, { fetch: fetchFn })

    await expect(client.generate("p", "r")).rejects.toMatchObject({
      code: "malformed_response",
      message: 'response has neither "text" nor "response" string field',
    })
  })

  it("aborts a slow request with a timeout error", async () => {
    const fetchFn = vi.fn(
      (_input: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")))
        }),
    )
    const client = new ModelClient(ENDPOINT, { maxRetries: 0, requestTimeoutMs: 20 }, { fetch: fetchFn })

    await expect(client.generate("p", "r")).rejects.toMatchObject({
      code: "timeout",
      message: "request timed out after 20ms",
    })
  })

  it("keeps a running mean of successful latencies", async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse({ text: "ok" }))
    const readings = [0, 100, 1000, 1300]
    const client = new ModelClient(ENDPOINT, {}, {
      fetch: fetchFn,
      clock: () => readings.shift() ?? 0,
    })

    await client.generate("p", "r")
    await client.generate("p", "r")

    expect(client.getStats().avg_latency_ms).toBe(200)
  })
})

describe("ModelClient.isHealthy", () => {
  it("turns unhealthy once errors reach the threshold", async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError("fetch failed")
    })
    const client = new ModelClient(
      ENDPOINT,
      { maxRetries: 1, unhealthyThreshold: 2 },
      { fetch: fetchFn, sleep: async () => {} },
    )
    expect(client.isHealthy()).toBe(true)

    await expect(client.generate("p", "r")).rejects.toThrow("fetch failed")
    expect(client.isHealthy()).toBe(false)
  })
})

describe("createModelClients", () => {
  it("builds one client per endpoint with the configured failure threshold", async () => {
    const config = loadConfig({ CB_FAILURES: "2", MAX_RETRIES: "1", MODEL_ENDPOINTS: "a=http://a.test/gen,b=http://b.test/gen" })
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError("fetch failed")
    })

    const clients = createModelClients(config, { fetch: fetchFn, sleep: async () => {} })

    expect(clients.map((c) => [c.name, c.url])).toEqual([
      ["a", "http://a.test/gen"],
      ["b", "http://b.test/gen"],
    ])
    await expect(clients[0].generate("p", "r")).rejects.toThrow("fetch failed")
    expect(clients[0].getStats().error_count).toBe(2)
    expect(clients[0].isHealthy()).toBe(false)
    expect(clients[1].isHealthy()).toBe(true)
  })
})
