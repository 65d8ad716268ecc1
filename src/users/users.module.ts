import { Module } from '@nestjs/common';
import { PersistenceModule } from '../persistence/persistence.module';
import { UsersService } from './users.service';
import { UsersController } from './users.controller';

@Module({
  imports: [PersistenceModule],
  providers: [UsersService],
  controllers: [UsersController],
  exports: [UsersService],
})
export class UsersModule {}
