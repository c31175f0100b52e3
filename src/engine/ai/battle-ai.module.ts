import { Module, type OnModuleInit } from '@nestjs/common';
import { AiSettingsController } from './ai-settings.controller.js';
import { BattleAiConfigService } from './battle-ai-config.service.js';
import { BattleAiService } from './battle-ai.service.js';
import { CoordinationService } from './coordination.service.js';
import { DecisionLogService } from './decision-log.service.js';
import { PositioningService } from './positioning.service.js';
import { ProfileRegistryService } from './profile-registry.service.js';
import { registerBuiltInProfiles } from './profiles/index.js';
import { SkillPriorityService } from './skill-priority.service.js';
import { ThreatService } from './threat.service.js';

@Module({
  controllers: [AiSettingsController],
  providers: [
    BattleAiConfigService,
    ThreatService,
    PositioningService,
    SkillPriorityService,
    ProfileRegistryService,
    CoordinationService,
    BattleAiService,
    DecisionLogService,
  ],
  exports: [BattleAiService, CoordinationService, DecisionLogService, BattleAiConfigService],
})
export class BattleAiModule implements OnModuleInit {
  constructor(private readonly registry: ProfileRegistryService) {}

  onModuleInit(): void {
    registerBuiltInProfiles(this.registry);
  }
}
