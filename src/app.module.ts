import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { CommonModule } from './common/common.module';
import { validate } from './config/environment.validation';
import { MarketplaceModule } from './marketplace/marketplace.module';
import { TasksModule } from './tasks/tasks.module';

/** Long-running worker: registers the hourly stage schedule. */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),
    ScheduleModule.forRoot(),
    CommonModule,
    MarketplaceModule,
    TasksModule,
  ],
})
export class AppModule {}
