import { Module } from "@nestjs/common";
import { APP_GUARD } from "@nestjs/core";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { ThrottlerGuard, ThrottlerModule } from "@nestjs/throttler";
import { envSchema } from "./config/env.validation";

import { LlmModule } from "./modules/llm/llm.module";
import { NlpModule } from "./modules/nlp/nlp.module";
import { TrialsModule } from "./modules/trials/trials.module";
import { SessionsModule } from "./modules/sessions/sessions.module";
import { ChatModule } from "./modules/chat/chat.module";
import { HealthModule } from "./modules/health/health.module";

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: (c) => envSchema.parse(c) }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => ({
        throttlers: [{
          ttl: (cfg.get<number>("RATE_LIMIT_TTL_SEC") ?? 60) * 1000,
          limit: cfg.get<number>("RATE_LIMIT_REQ_PER_TTL") ?? 20
        }]
      })
    }),
    LlmModule,
    NlpModule,
    TrialsModule,
    SessionsModule,
    ChatModule,
    HealthModule
  ],
  providers: [{ provide: APP_GUARD, useClass: ThrottlerGuard }]
})
export class AppModule {}
