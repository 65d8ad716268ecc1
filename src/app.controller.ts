import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  @Get('health')
  health() {
    return { status: 'healthy', message: 'Serenity backend is running' };
  }
}
