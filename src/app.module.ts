import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { DrizzleModule } from './db/drizzle.module.js';
import { GameExceptionFilter } from './common/filters/game-exception.filter.js';
import { ContentModule } from './content/content.module.js';
import { BattlesModule } from './battles/battles.module.js';

@Module({
  imports: [DrizzleModule, ContentModule, BattlesModule],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GameExceptionFilter,
    },
  ],
})
export class AppModule {}
