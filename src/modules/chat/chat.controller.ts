import { BadRequestException, Body, Controller, HttpCode, HttpStatus, Post } from "@nestjs/common";
import { Throttle } from "@nestjs/throttler";
import { IntakeValidationError } from "../sessions/session.types";
import { EndSessionDto, IntakeDto, MessageDto } from "./dto";
import { ChatService } from "./chat.service";

@Controller()
export class ChatController {
  constructor(private readonly chat: ChatService) {}

  @Post("intake")
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 30, ttl: 60_000 } })
  async intake(@Body() dto: IntakeDto) {
    try {
      return await this.chat.submitIntake(dto);
    } catch (error) {
      if (error instanceof IntakeValidationError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  @Post("message")
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 20, ttl: 60_000 } })
  async send(@Body() dto: MessageDto) {
    return this.chat.handleMessage(dto.user_id, dto.message);
  }

  @Post("end-session")
  @HttpCode(HttpStatus.OK)
  async endSession(@Body() dto: EndSessionDto) {
    return this.chat.endSession(dto.user_id);
  }
}
