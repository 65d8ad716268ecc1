import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  Post,
  Query,
} from '@nestjs/common';
import { requireSessionId } from '../common/session-id';
import { ExerciseService } from './exercise.service';
import { isExerciseKind } from './exercise-steps';
import { ExerciseView, TransitionResult, describeExercise } from './exercise-state-machine';

function viewOrConflict(result: TransitionResult): ExerciseView {
  if (!result.ok) {
    throw new ConflictException(`Exercise transition rejected: ${result.reason}`);
  }
  return describeExercise(result.state);
}

@Controller('exercise')
export class ExerciseController {
  constructor(private readonly exerciseService: ExerciseService) {}

  @Get()
  getExercise(@Query('session_id') sessionId: unknown) {
    return this.exerciseService.getView(requireSessionId(sessionId));
  }

  @Post('enter')
  @HttpCode(200)
  enter(@Body('session_id') sessionId: unknown, @Body('kind') kind: unknown) {
    const id = requireSessionId(sessionId);
    if (!isExerciseKind(kind)) {
      throw new BadRequestException('kind must be "grounding" or "panic"');
    }
    return viewOrConflict(this.exerciseService.enter(id, kind));
  }

  @Post('advance')
  @HttpCode(200)
  advance(@Body('session_id') sessionId: unknown) {
    return viewOrConflict(this.exerciseService.advance(requireSessionId(sessionId)));
  }

  @Post('finish')
  @HttpCode(200)
  async finish(@Body('session_id') sessionId: unknown) {
    return viewOrConflict(await this.exerciseService.finish(requireSessionId(sessionId)));
  }

  @Post('abort')
  @HttpCode(200)
  abort(@Body('session_id') sessionId: unknown) {
    return this.exerciseService.abort(requireSessionId(sessionId));
  }
}
