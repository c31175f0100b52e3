// 전투 AI 설정 API: 런타임 임계값/기본 프로필 변경

import { Body, Controller, Get, Patch } from '@nestjs/common';
import { BadRequestError } from '../../common/errors/game-errors.js';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe.js';
import { BattleAiConfigService } from './battle-ai-config.service.js';
import { ProfileRegistryService } from './profile-registry.service.js';
import {
  UpdateAiSettingsBodySchema,
  type UpdateAiSettingsBody,
} from './dto/update-ai-settings.dto.js';

@Controller('v1/settings/ai')
export class AiSettingsController {
  constructor(
    private readonly configService: BattleAiConfigService,
    private readonly registry: ProfileRegistryService,
  ) {}

  @Get()
  getSettings() {
    return {
      ...this.configService.get(),
      profiles: this.registry.list().map((p) => ({ id: p.id, description: p.description })),
    };
  }

  /** 다음 AI 턴부터 반영 */
  @Patch()
  updateSettings(
    @Body(new ZodValidationPipe(UpdateAiSettingsBodySchema)) body: UpdateAiSettingsBody,
  ) {
    if (body.defaultProfile !== undefined && !this.registry.get(body.defaultProfile)) {
      throw new BadRequestError(`Unknown AI profile "${body.defaultProfile}"`, {
        profiles: this.registry.list().map((p) => p.id),
      });
    }
    return this.configService.update(body);
  }
}
