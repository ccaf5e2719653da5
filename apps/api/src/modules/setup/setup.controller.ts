import { Body, ConflictException, Controller, Get, Post } from "@nestjs/common";
import { AppConfigSchema, BasicSetupRequestSchema } from "@digitbot/shared";

import { ConfigService } from "../config/config.service";
import { parseBody } from "../http/parse-body";

@Controller("setup")
export class SetupController {
  constructor(private readonly configService: ConfigService) {}

  @Get("status")
  getStatus(): { initialized: boolean } {
    return { initialized: this.configService.isInitialized() };
  }

  /** First-run setup. Returns the generated API key once; later reads only expose a hint. */
  @Post("basic")
  setupBasic(@Body() body: unknown): { initialized: true; apiKey: string } {
    if (this.configService.isInitialized()) {
      throw new ConflictException("Already initialized.");
    }

    const request = parseBody(BasicSetupRequestSchema, body);
    const config = this.configService.createInitialConfig(request);
    this.configService.save(config);

    return { initialized: true, apiKey: config.advanced.apiKey };
  }

  @Post("import")
  importConfig(@Body() body: unknown): { initialized: true } {
    if (this.configService.isInitialized()) {
      throw new ConflictException("Already initialized.");
    }

    const config = parseBody(AppConfigSchema, body);
    this.configService.importConfig(config);
    return { initialized: true };
  }
}
