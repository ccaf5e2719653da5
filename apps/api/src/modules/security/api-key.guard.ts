import crypto from "node:crypto";

import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from "@nestjs/common";
import type { Request } from "express";

import { ConfigService } from "../config/config.service";

export type RouteAccess = "open" | "bootstrap" | "keyed";

const ROUTE_ACCESS: ReadonlyArray<{ prefix: string; access: RouteAccess }> = [
  { prefix: "/health", access: "open" },
  { prefix: "/setup/status", access: "open" },
  { prefix: "/setup", access: "bootstrap" }
];

/** "bootstrap" routes stay open only until the first config is written. */
export function routeAccess(path: string): RouteAccess {
  const match = ROUTE_ACCESS.find(({ prefix }) => path === prefix || path.startsWith(`${prefix}/`));
  return match?.access ?? "keyed";
}

export function apiKeyMatches(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<Request>();
    const access = routeAccess(req.path ?? req.url);
    if (access === "open") return true;

    const config = this.configService.load();
    if (!config) {
      if (access === "bootstrap") return true;
      throw new UnauthorizedException("Bot is not initialized. Complete /setup first.");
    }

    const presented = req.header("x-api-key");
    if (!presented) {
      throw new UnauthorizedException("Missing x-api-key header.");
    }
    if (!apiKeyMatches(presented, config.advanced.apiKey)) {
      throw new UnauthorizedException("Invalid API key.");
    }
    return true;
  }
}
