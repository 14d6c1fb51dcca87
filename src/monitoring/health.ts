// src/monitoring/health.ts — Health aggregator over registered service checks

export type ServiceStatus = "ok" | "degraded" | "down"

export interface ServiceHealth {
  status: ServiceStatus
  [detail: string]: unknown
}

export type HealthCheck = () => ServiceHealth | Promise<ServiceHealth>

export interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy"
  uptime_seconds: number
  timestamp: string
  system: {
    rss_bytes: number
    heap_used_bytes: number
  }
  services: Record<string, ServiceHealth>
}

export class HealthMonitor {
  private readonly checks = new Map<string, HealthCheck>()
  private readonly bootTime: number

  constructor(private readonly now: () => number = Date.now) {
    this.bootTime = now()
  }

  registerHealthCheck(name: string, check: HealthCheck): void {
    this.checks.set(name, check)
  }

  /** A check that throws is reported as `down` with its error message. */
  async check(): Promise<HealthStatus> {
    const services: Record<string, ServiceHealth> = {}
    for (const [name, check] of this.checks) {
      try {
        services[name] = await check()
      } catch (err) {
        services[name] = { status: "down", error: err instanceof Error ? err.message : String(err) }
      }
    }

    const statuses = Object.values(services).map((s) => s.status)
    let overall: HealthStatus["status"] = "healthy"
    if (statuses.includes("down")) overall = "unhealthy"
    else if (statuses.includes("degraded")) overall = "degraded"

    const memory = process.memoryUsage()
    const current = this.now()
    return {
      status: overall,
      uptime_seconds: Math.floor((current - this.bootTime) / 1000),
      timestamp: new Date(current).toISOString(),
      system: { rss_bytes: memory.rss, heap_used_bytes: memory.heapUsed },
      services,
    }
  }
}
