import { Module } from "@nestjs/common";
import { ChatController } from "./chat.controller";
import { ChatService } from "./chat.service";
import { SessionsModule } from "../sessions/sessions.module";
import { NlpModule } from "../nlp/nlp.module";
import { TrialsModule } from "../trials/trials.module";

@Module({
  imports: [SessionsModule, NlpModule, TrialsModule],
  controllers: [ChatController],
  providers: [ChatService]
})
export class ChatModule {}
