import { Controller, Get } from "@nestjs/common";

@Controller("health")
export class HealthController {
  @Get()
  getHealth(): { ok: true; ts: string; uptimeSec: number } {
    return { ok: true, ts: new Date().toISOString(), uptimeSec: Math.round(process.uptime()) };
  }
}
