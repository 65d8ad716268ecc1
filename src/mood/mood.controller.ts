import { Controller, Get, Query } from '@nestjs/common';
import { requireSessionId } from '../common/session-id';
import { RECENT_MOOD_LOG_LIMIT } from '../persistence/persistence-store';
import { MoodService } from './mood.service';

const parseLimit = (limit: unknown): number => {
  const parsed = typeof limit === 'string' ? parseInt(limit, 10) : NaN;
  return Number.isFinite(parsed) ? parsed : RECENT_MOOD_LOG_LIMIT;
};

@Controller('mood')
export class MoodController {
  constructor(private readonly moodService: MoodService) {}

  @Get('history')
  async getMoodHistory(@Query('session_id') sessionId: unknown, @Query('limit') limit?: unknown) {
    return this.moodService.getMoodHistory(requireSessionId(sessionId), parseLimit(limit));
  }

  @Get('summary')
  async getMoodSummary(@Query('session_id') sessionId: unknown, @Query('limit') limit?: unknown) {
    return this.moodService.getMoodSummary(requireSessionId(sessionId), parseLimit(limit));
  }
}
