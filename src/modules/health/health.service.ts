import { Injectable } from "@nestjs/common";

export interface HealthStatus {
  status: "ok";
  timestamp: string;
  uptimeSec: number;
}

@Injectable()
export class HealthService {
  private readonly startedAt = Date.now();

  // Liveness only: no upstream checks, so a registry outage never fails it
  check(): HealthStatus {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      uptimeSec: Math.floor((Date.now() - this.startedAt) / 1000)
    };
  }
}
