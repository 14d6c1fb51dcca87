// src/streams/ws-source.ts — `ws` adapter exposing a feed connection as an async iterable
//
// The stream manager only needs three things from a connection: open it, iterate
// its text messages, and close it. Keepalive (ping every interval, terminate when
// no pong arrives in time) lives here so the manager stays transport-agnostic.

import { WebSocket, type RawData } from "ws"

/** One open inbound connection. Iteration ends on a clean close and throws on failure. */
export interface StreamSocket extends AsyncIterable<string> {
  close(): void
}

/** Opens a connection to `url`; rejects when the handshake fails. */
export type StreamOpener = (url: string) => Promise<StreamSocket>

export interface WsSourceOptions {
  pingIntervalMs: number  // Default: 20_000
  pingTimeoutMs: number   // Default: 10_000
  handshakeTimeoutMs: number  // Default: 15_000
}

export const DEFAULT_WS_SOURCE_OPTIONS: WsSourceOptions = {
  pingIntervalMs: 20_000,
  pingTimeoutMs: 10_000,
  handshakeTimeoutMs: 15_000,
}

/** Close codes that mean the peer hung up on purpose. */
const CLEAN_CLOSE_CODES = new Set([1000, 1005])

function decode(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8")
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8")
  return Buffer.from(data).toString("utf8")
}

type Waiter = {
  resolve: (result: IteratorResult<string>) => void
  reject: (err: Error) => void
}

class WsStreamSocket implements StreamSocket {
  private buffer: string[] = []
  private waiter: Waiter | null = null
  private done = false
  private failure: Error | null = null
  private closedLocally = false
  private pingTimer: ReturnType<typeof setInterval> | null = null
  private pongTimer: ReturnType<typeof setTimeout> | null = null

  constructor(private readonly ws: WebSocket, private readonly options: WsSourceOptions) {
    ws.on("message", (data) => this.push(decode(data)))
    ws.on("pong", () => this.clearPongTimer())
    ws.on("error", (err) => this.fail(err))
    ws.on("close", (code) => {
      this.stopKeepalive()
      if (this.closedLocally || CLEAN_CLOSE_CODES.has(code)) {
        this.finish()
      } else {
        this.fail(new Error(`connection closed with code ${code}`))
      }
    })
    this.startKeepalive()
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return { next: () => this.next() }
  }

  close(): void {
    if (this.closedLocally) return
    this.closedLocally = true
    this.stopKeepalive()
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close()
    }
    this.finish()
  }

  private next(): Promise<IteratorResult<string>> {
    const value = this.buffer.shift()
    if (value !== undefined) return Promise.resolve({ value, done: false })
    if (this.failure) return Promise.reject(this.failure)
    if (this.done) return Promise.resolve({ value: undefined, done: true })
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject }
    })
  }

  private push(message: string): void {
    if (this.done || this.failure) return
    const waiter = this.waiter
    if (waiter) {
      this.waiter = null
      waiter.resolve({ value: message, done: false })
    } else {
      this.buffer.push(message)
    }
  }

  private finish(): void {
    if (this.done || this.failure) return
    this.done = true
    const waiter = this.waiter
    this.waiter = null
    waiter?.resolve({ value: undefined, done: true })
  }

  private fail(err: Error): void {
    if (this.done || this.failure) return
    this.failure = err
    this.stopKeepalive()
    const waiter = this.waiter
    this.waiter = null
    waiter?.reject(err)
  }

  private startKeepalive(): void {
    this.pingTimer = setInterval(() => {
      if (this.pongTimer) return
      this.ws.ping()
      this.pongTimer = setTimeout(() => {
        this.fail(new Error(`no pong within ${this.options.pingTimeoutMs}ms`))
        this.ws.terminate()
      }, this.options.pingTimeoutMs)
      this.pongTimer.unref()
    }, this.options.pingIntervalMs)
    this.pingTimer.unref()
  }

  private clearPongTimer(): void {
    if (this.pongTimer) {
      clearTimeout(this.pongTimer)
      this.pongTimer = null
    }
  }

  private stopKeepalive(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer)
      this.pingTimer = null
    }
    this.clearPongTimer()
  }
}

/** Build a StreamOpener backed by the `ws` client. */
export function createWsOpener(options?: Partial<WsSourceOptions>): StreamOpener {
  const opts: WsSourceOptions = { ...DEFAULT_WS_SOURCE_OPTIONS, ...options }

  return (url: string) =>
    new Promise<StreamSocket>((resolve, reject) => {
      const ws = new WebSocket(url, { handshakeTimeout: opts.handshakeTimeoutMs })

      const onOpen = () => {
        ws.off("error", onError)
        resolve(new WsStreamSocket(ws, opts))
      }
      const onError = (err: Error) => {
        ws.off("open", onOpen)
        reject(err)
      }

      ws.once("open", onOpen)
      ws.once("error", onError)
    })
}
