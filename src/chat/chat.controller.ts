import { BadRequestException, Body, Controller, Get, HttpCode, Post, Query } from '@nestjs/common';
import { requireSessionId } from '../common/session-id';
import { ChatService } from './chat.service';

@Controller('chat')
export class ChatController {
  constructor(private readonly chatService: ChatService) {}

  @Post()
  @HttpCode(200)
  async sendMessage(@Body('prompt') prompt: unknown, @Body('session_id') sessionId: unknown) {
    if (typeof prompt !== 'string') {
      throw new BadRequestException('prompt must be a string');
    }
    return this.chatService.sendMessage(requireSessionId(sessionId), prompt);
  }

  @Get('history')
  async getChatHistory(@Query('session_id') sessionId: unknown) {
    const history = await this.chatService.getChatHistory(requireSessionId(sessionId));
    return { history };
  }
}
