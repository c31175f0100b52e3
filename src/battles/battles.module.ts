import { Module } from '@nestjs/common';
import { BattleAiModule } from '../engine/ai/battle-ai.module.js';
import { BattlesController } from './battles.controller.js';
import { BattlesService } from './battles.service.js';

@Module({
  imports: [BattleAiModule],
  controllers: [BattlesController],
  providers: [BattlesService],
})
export class BattlesModule {}
