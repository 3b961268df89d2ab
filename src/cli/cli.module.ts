import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CommonModule } from '../common/common.module';
import { validate } from '../config/environment.validation';
import { MarketplaceModule } from '../marketplace/marketplace.module';
import { TasksModule } from '../tasks/tasks.module';

/** Same graph as the worker, without the scheduler. */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),
    CommonModule,
    MarketplaceModule,
    TasksModule,
  ],
})
export class CliModule {}
