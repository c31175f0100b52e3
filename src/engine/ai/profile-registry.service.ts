// AI 프로필 레지스트리: 태그 → 프로필 (Strategy 패턴)

import { Injectable, Logger } from '@nestjs/common';
import { BattleAiConfigService } from './battle-ai-config.service.js';
import type { AiProfile } from './profiles/index.js';

@Injectable()
export class ProfileRegistryService {
  private readonly logger = new Logger(ProfileRegistryService.name);
  private readonly profiles = new Map<string, AiProfile>();

  constructor(private readonly configService: BattleAiConfigService) {}

  register(profile: AiProfile): void {
    const id = profile.id.trim();
    if (!id) {
      throw new Error('AI profile id cannot be empty');
    }
    if (this.profiles.has(id)) {
      throw new Error(`AI profile "${id}" is already registered`);
    }
    this.profiles.set(id, profile);
    this.logger.log(`Registered AI profile: ${id}`);
  }

  get(id: string): AiProfile | undefined {
    return this.profiles.get(id);
  }

  list(): AiProfile[] {
    return [...this.profiles.values()];
  }

  /** 알 수 없는/빈 태그는 기본 프로필로. 기본 프로필조차 없으면 설정 오류 */
  resolve(tag: string | undefined): AiProfile {
    const found = tag ? this.profiles.get(tag) : undefined;
    if (found) return found;

    const fallbackId = this.configService.get().defaultProfile;
    const fallback = this.profiles.get(fallbackId);
    if (!fallback) {
      throw new Error(`Default AI profile "${fallbackId}" not registered`);
    }
    if (tag) {
      this.logger.warn(`Unknown AI profile "${tag}", falling back to "${fallbackId}"`);
    }
    return fallback;
  }
}
