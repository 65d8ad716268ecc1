import { Controller, Get, Query } from '@nestjs/common';
import { requireSessionId } from '../common/session-id';
import { UsersService } from './users.service';

@Controller('profile')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get()
  async getProfile(@Query('session_id') sessionId: unknown) {
    return this.usersService.getProfileSummary(requireSessionId(sessionId));
  }
}
